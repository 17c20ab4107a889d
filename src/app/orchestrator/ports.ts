/**
 * Reconciliation ports: the slices of a git mirror each stage depends on.
 * Purpose: let the resolver, collector and orchestrator run against fakes in tests.
 * Assumptions: GitMirror implements every port; fakes implement only what a test needs.
 * Usage: resolveReleaseBranches(spec, context, mirror) with a GitMirror or a fake.
 */

import type { RepositorySpec } from "../../core/repository-spec.js";
import type { CommitSummary, EnsureResult, TagQuery, TagRef } from "../../git/mirror.js";

// =============================================================================
// PORTS
// =============================================================================

export interface RemoteBranchQuery {
  remoteBranchExists(branch: string): Promise<boolean>;
  listRemoteBranchesMatching(prefix: string): Promise<string[]>;
}

export interface TagSource {
  tagsMatching(pattern: string, query?: TagQuery): Promise<TagRef[]>;
}

export interface HistorySource {
  commitAt(ref: string): Promise<string>;
  logSince(fromRef: string, toRef: string, limit: number): Promise<CommitSummary[]>;
}

export interface MirrorPort extends RemoteBranchQuery, TagSource, HistorySource {
  ensure(): Promise<EnsureResult>;
  checkout(branch: string): Promise<void>;
  lastCommitDate(ref: string): Promise<string>;
}

export type MirrorFactory = (spec: RepositorySpec) => MirrorPort;

/**
 * Local mirror of one remote repository.
 * Purpose: clone/fetch, branch discovery, checkout and tag queries for one RepositorySpec.
 * Assumptions: the mirror directory belongs to this tool; one process at a time uses it.
 * Usage: const mirror = new GitMirror(spec, { timeoutMs }); await mirror.ensure();
 */

import fs from "node:fs";
import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { CheckoutConflictError, MirrorUnavailableError } from "../core/errors.js";
import type { RepositorySpec } from "../core/repository-spec.js";
import { ensureDir, isGitRepo, splitLines } from "../core/utils.js";

import {
  DEFAULT_GIT_TIMEOUT_MS,
  git,
  gitOutput,
  isFastForwardRejection,
  isTimeoutError,
  type GitRunOptions,
} from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export type MirrorTarget = Pick<RepositorySpec, "name" | "url" | "localPath">;

export type GitMirrorOptions = {
  timeoutMs?: number;
};

export type EnsureResult = "cloned" | "fetched";

export type TagRef = {
  name: string;
  /** Creator date in unix seconds: tagger date for annotated tags, commit date otherwise. */
  createdAt: number;
};

export type TagQuery = {
  mergedInto?: string;
  limit?: number;
};

export type CommitSummary = {
  sha: string;
  subject: string;
};

// =============================================================================
// MIRROR
// =============================================================================

export class GitMirror {
  private readonly runOptions: GitRunOptions;

  constructor(
    public readonly target: MirrorTarget,
    options: GitMirrorOptions = {},
  ) {
    this.runOptions = { timeoutMs: options.timeoutMs };
  }

  get localPath(): string {
    return this.target.localPath;
  }

  exists(): boolean {
    return isGitRepo(this.localPath);
  }

  async ensure(): Promise<EnsureResult> {
    const { name, url, localPath } = this.target;

    if (!this.exists()) {
      const parent = path.dirname(localPath);
      try {
        await ensureDir(parent);
        await git(parent, ["clone", url, localPath], this.runOptions);
      } catch (err) {
        const reason = isTimeoutError(err)
          ? `Timed out cloning ${name} from ${url} after ${this.timeoutMs()} ms.`
          : `Unable to clone ${name} from ${url}: ${formatErrorMessage(err)}`;
        throw new MirrorUnavailableError(reason, name, err);
      }
      return "cloned";
    }

    try {
      await git(localPath, ["fetch", "--all", "--tags", "--prune", "--force"], this.runOptions);
    } catch (err) {
      const reason = isTimeoutError(err)
        ? `Timed out fetching ${name} in ${localPath} after ${this.timeoutMs()} ms.`
        : `Unable to fetch ${name} in ${localPath}: ${formatErrorMessage(err)}`;
      throw new MirrorUnavailableError(reason, name, err);
    }
    return "fetched";
  }

  // ---------------------------------------------------------------------------
  // Remote queries (never touch the local mirror)
  // ---------------------------------------------------------------------------

  async remoteBranchExists(branch: string): Promise<boolean> {
    const out = await gitOutput(
      this.queryCwd(),
      ["ls-remote", "--heads", this.target.url, `refs/heads/${branch}`],
      this.runOptions,
    );
    return parseRemoteHeads(out).includes(branch);
  }

  async listRemoteBranchesMatching(prefix: string): Promise<string[]> {
    const out = await gitOutput(
      this.queryCwd(),
      ["ls-remote", "--heads", this.target.url],
      this.runOptions,
    );
    return parseRemoteHeads(out).filter((branch) => branch.startsWith(prefix));
  }

  // ---------------------------------------------------------------------------
  // Local branches
  // ---------------------------------------------------------------------------

  async listLocalBranches(): Promise<string[]> {
    const out = await gitOutput(
      this.localPath,
      ["for-each-ref", "--format=%(refname:strip=2)", "refs/heads/"],
      this.runOptions,
    );
    return splitLines(out);
  }

  async currentBranch(): Promise<string> {
    return gitOutput(this.localPath, ["rev-parse", "--abbrev-ref", "HEAD"], this.runOptions);
  }

  /**
   * Make `branch` the checked-out branch, tracking origin. An existing local
   * branch is fast-forwarded; one that has diverged is reported, not repaired.
   */
  async checkout(branch: string): Promise<void> {
    const local = await this.listLocalBranches();

    if (!local.includes(branch)) {
      await git(this.localPath, ["checkout", "-B", branch, `origin/${branch}`], this.runOptions);
      return;
    }

    await git(this.localPath, ["checkout", branch], this.runOptions);
    try {
      await git(this.localPath, ["pull", "--ff-only", "origin", branch], this.runOptions);
    } catch (err) {
      if (isFastForwardRejection(err)) {
        throw new CheckoutConflictError(
          `${this.target.name}: local ${branch} has diverged from origin/${branch} and cannot be fast-forwarded.`,
          branch,
          err,
        );
      }
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Tags and history
  // ---------------------------------------------------------------------------

  /** Tags whose name starts with `pattern`, newest creator date first. */
  async tagsMatching(pattern: string, query: TagQuery = {}): Promise<TagRef[]> {
    const args = [
      "for-each-ref",
      "--sort=-creatordate",
      "--format=%(refname:strip=2)%09%(creatordate:unix)",
    ];
    if (query.mergedInto !== undefined) {
      args.push(`--merged=refs/heads/${query.mergedInto}`);
    }
    args.push("refs/tags/");

    const out = await gitOutput(this.localPath, args, this.runOptions);
    const tags = parseTagRefs(out).filter((tag) => tag.name.startsWith(pattern));
    return query.limit === undefined ? tags : tags.slice(0, query.limit);
  }

  /** Commit SHA a ref points at; annotated tags are peeled. */
  async commitAt(ref: string): Promise<string> {
    return gitOutput(this.localPath, ["rev-parse", "--verify", `${ref}^{commit}`], this.runOptions);
  }

  async logSince(fromRef: string, toRef: string, limit: number): Promise<CommitSummary[]> {
    const out = await gitOutput(
      this.localPath,
      ["log", "--format=%h%x09%s", "-n", String(limit), `${fromRef}..${toRef}`],
      this.runOptions,
    );
    return splitLines(out).map(parseCommitLine);
  }

  /** Committer date of `ref`, ISO 8601. */
  async lastCommitDate(ref: string): Promise<string> {
    return gitOutput(this.localPath, ["log", "-1", "--format=%cI", ref], this.runOptions);
  }

  private timeoutMs(): number {
    return this.runOptions.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  private queryCwd(): string {
    if (this.exists()) return this.localPath;
    const parent = path.dirname(this.localPath);
    return fs.existsSync(parent) ? parent : process.cwd();
  }
}

// =============================================================================
// PARSERS
// =============================================================================

export function parseRemoteHeads(output: string): string[] {
  const prefix = "refs/heads/";
  return splitLines(output)
    .map((line) => line.split("\t")[1] ?? "")
    .filter((ref) => ref.startsWith(prefix))
    .map((ref) => ref.slice(prefix.length));
}

export function parseTagRefs(output: string): TagRef[] {
  return splitLines(output).map((line) => {
    const [name, created] = line.split("\t");
    const createdAt = Number(created);
    return { name, createdAt: Number.isFinite(createdAt) ? createdAt : 0 };
  });
}

function parseCommitLine(line: string): CommitSummary {
  const tab = line.indexOf("\t");
  if (tab < 0) return { sha: line, subject: "" };
  return { sha: line.slice(0, tab), subject: line.slice(tab + 1) };
}

/**
 * Reconciliation run: sync every repository, resolve its release branches and collect tags.
 * Purpose: drive the per-repository pipeline across a bounded pool and join the results.
 * Assumptions: repositories are independent; each task owns its mirror and its outcome.
 * Usage: const result = await reconcileRepositories({ specs, context, createMirror });
 */

import { formatErrorMessage } from "../../core/error-format.js";
import { CheckoutConflictError, MirrorUnavailableError } from "../../core/errors.js";
import {
  logRepoEvent,
  NullEventSink,
  type EventSink,
  type JsonObject,
} from "../../core/logger.js";
import type { ReleaseContext } from "../../core/release-context.js";
import type { RepositorySpec } from "../../core/repository-spec.js";
import { formatVersion, isPrerelease } from "../../core/version-tag.js";
import type { EnsureResult } from "../../git/mirror.js";

import { resolveReleaseBranches, type ResolvedBranches } from "./branch-resolver.js";
import type { MirrorFactory, MirrorPort } from "./ports.js";
import { collectTags, type RepoState } from "./tag-collector.js";
import { runWithConcurrency } from "./worker-pool.js";

export const DEFAULT_MAX_PARALLEL = 5;

// =============================================================================
// TYPES
// =============================================================================

export type RepoPhase =
  | "pending"
  | "syncing"
  | "branch_resolved"
  | "tags_collected"
  | "done"
  | "failed";

export type FailureKind = "remote_unreachable" | "checkout_conflict" | "git_error";

export type RepoFailure = {
  /** Phase the repository was in when the failure happened. */
  phase: RepoPhase;
  kind: FailureKind;
  branch?: string;
  message: string;
  error: unknown;
};

export type BranchSync = {
  branch: string;
  lastCommitDate: string;
};

export type BranchCheckoutFailure = {
  branch: string;
  kind: FailureKind;
  message: string;
};

export type RepoOutcome = {
  name: string;
  phase: RepoPhase;
  history: RepoPhase[];
  ensure?: EnsureResult;
  resolved?: ResolvedBranches;
  /** Branches that checked out cleanly, in resolution order. */
  synced: BranchSync[];
  /** Branches that failed to check out; their tags are not collected. */
  failedBranches: BranchCheckoutFailure[];
  /** Present whenever at least tag collection ran, including after a checkout conflict. */
  state?: RepoState;
  failure?: RepoFailure;
};

export type ReconcileOptions = {
  specs: readonly RepositorySpec[];
  context: ReleaseContext;
  createMirror: MirrorFactory;
  maxParallel?: number;
  tagHistoryLimit?: number;
  events?: EventSink;
  onRepoSettled?: (outcome: RepoOutcome) => void;
};

export type ReconcileResult = {
  context: ReleaseContext;
  outcomes: Map<string, RepoOutcome>;
  /** True only when every repository reached `done`. */
  ok: boolean;
};

const TRANSITIONS: Record<RepoPhase, readonly RepoPhase[]> = {
  pending: ["syncing"],
  syncing: ["branch_resolved", "failed"],
  branch_resolved: ["tags_collected", "failed"],
  tags_collected: ["done"],
  done: [],
  failed: [],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function reconcileRepositories(options: ReconcileOptions): Promise<ReconcileResult> {
  const events = options.events ?? new NullEventSink();
  const requested = options.maxParallel ?? DEFAULT_MAX_PARALLEL;
  const limit = Math.max(1, Math.min(requested, options.specs.length));

  events.log({
    type: "run.start",
    payload: {
      channel: options.context.channel,
      base_version: options.context.baseVersion,
      version: formatVersion(options.context.version),
      prerelease: isPrerelease(options.context.version),
      release_branch: options.context.releaseBranch,
      repositories: options.specs.map((spec) => spec.name),
    },
  });

  const settled = await runWithConcurrency(options.specs, limit, async (spec) => {
    const outcome = await syncRepository(spec, options.createMirror(spec), {
      context: options.context,
      tagHistoryLimit: options.tagHistoryLimit,
      events,
    });
    options.onRepoSettled?.(outcome);
    return outcome;
  });

  // Join: every task has settled; assemble the result map in configuration order.
  const outcomes = new Map<string, RepoOutcome>();
  for (const task of settled) {
    const outcome =
      task.status === "fulfilled" ? task.value : unexpectedFailure(task.item.name, task.reason);
    outcomes.set(task.item.name, outcome);
  }

  const ok = [...outcomes.values()].every((outcome) => outcome.phase === "done");
  events.log({
    type: "run.complete",
    payload: {
      ok,
      failed: [...outcomes.values()]
        .filter((outcome) => outcome.phase === "failed")
        .map((outcome) => outcome.name),
    },
  });

  return { context: options.context, outcomes, ok };
}

/**
 * One repository, start to finish. Git failures never escape: they end the
 * outcome in `failed`, keeping whatever was gathered before the failure.
 */
export async function syncRepository(
  spec: RepositorySpec,
  mirror: MirrorPort,
  options: { context: ReleaseContext; tagHistoryLimit?: number; events?: EventSink },
): Promise<RepoOutcome> {
  const events = options.events ?? new NullEventSink();
  const outcome: RepoOutcome = {
    name: spec.name,
    phase: "pending",
    history: ["pending"],
    synced: [],
    failedBranches: [],
  };
  const advance = (next: RepoPhase): void => {
    transition(outcome, next);
    logRepoEvent(events, "repo.phase", spec.name, { phase: next });
  };

  try {
    advance("syncing");
    outcome.ensure = await mirror.ensure();
    outcome.resolved = await resolveReleaseBranches(spec, options.context, mirror);
    advance("branch_resolved");

    // A branch that fails to check out is skipped; the others are still synced and reported.
    for (const branch of outcome.resolved.branches) {
      try {
        await mirror.checkout(branch);
        outcome.synced.push({ branch, lastCommitDate: await mirror.lastCommitDate(branch) });
      } catch (err) {
        const failure = describeFailure(outcome.phase, err, branch);
        outcome.failure ??= failure;
        outcome.failedBranches.push({ branch, kind: failure.kind, message: failure.message });
        logRepoEvent(events, "repo.checkout_failed", spec.name, {
          branch,
          kind: failure.kind,
          message: failure.message,
        });
      }
    }

    outcome.state = await collectTags(
      mirror,
      outcome.synced.map((entry) => entry.branch),
      spec.tagPatterns,
      { historyLimit: options.tagHistoryLimit },
    );

    if (outcome.failure) {
      advance("failed");
      logRepoEvent(events, "repo.failed", spec.name, failurePayload(outcome.failure));
      return outcome;
    }

    advance("tags_collected");
    advance("done");
    logRepoEvent(events, "repo.done", spec.name, {
      branches: outcome.synced.map((entry) => entry.branch),
    });
  } catch (err) {
    outcome.failure = outcome.failure ?? describeFailure(outcome.phase, err);
    advance("failed");
    logRepoEvent(events, "repo.failed", spec.name, failurePayload(outcome.failure));
  }

  return outcome;
}

// =============================================================================
// INTERNALS
// =============================================================================

function transition(outcome: RepoOutcome, next: RepoPhase): void {
  if (!TRANSITIONS[outcome.phase].includes(next)) {
    throw new Error(`Invalid phase transition for ${outcome.name}: ${outcome.phase} -> ${next}`);
  }
  outcome.phase = next;
  outcome.history.push(next);
}

function describeFailure(phase: RepoPhase, err: unknown, branch?: string): RepoFailure {
  const kind: FailureKind =
    err instanceof MirrorUnavailableError
      ? "remote_unreachable"
      : err instanceof CheckoutConflictError
        ? "checkout_conflict"
        : "git_error";

  return {
    phase,
    kind,
    branch: err instanceof CheckoutConflictError ? err.branch : branch,
    message: formatErrorMessage(err),
    error: err,
  };
}

function failurePayload(failure: RepoFailure): JsonObject {
  const payload: JsonObject = {
    phase: failure.phase,
    kind: failure.kind,
    message: failure.message,
  };
  if (failure.branch) {
    payload.branch = failure.branch;
  }
  return payload;
}

function unexpectedFailure(name: string, reason: unknown): RepoOutcome {
  return {
    name,
    phase: "failed",
    history: ["pending", "failed"],
    synced: [],
    failedBranches: [],
    failure: describeFailure("pending", reason),
  };
}

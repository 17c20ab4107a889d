import type { MirrorFactory } from "../app/orchestrator/ports.js";
import {
  reconcileRepositories,
  type ReconcileResult,
  type RepoOutcome,
} from "../app/orchestrator/reconcile.js";
import {
  buildChangeSummaries,
  buildCompareRows,
  buildSummaryRows,
  type ChangeSummary,
  type CompareRow,
  type SummaryRow,
} from "../app/orchestrator/report.js";
import {
  ChannelSchema,
  StabilitySchema,
  type Channel,
  type ReleaseSyncConfig,
  type Stability,
} from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger, NullEventSink, type EventSink } from "../core/logger.js";
import { createReleaseContext, type ReleaseContext } from "../core/release-context.js";
import type { RepositorySpec } from "../core/repository-spec.js";
import { defaultRunId } from "../core/utils.js";
import { formatVersion, isPrerelease } from "../core/version-tag.js";
import { GitMirror } from "../git/mirror.js";

import { createReleasePrompter, type ReleasePrompter } from "./prompts.js";
import {
  formatReleaseHeader,
  formatRepoProgress,
  renderBranchTags,
  renderChangeSummary,
  renderCompare,
  renderSummary,
  renderSyncStatus,
} from "./sync-output.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncCommandOptions = {
  channel?: string;
  stability?: string;
  baseVersion?: string;
  /** False under `--no-input`: unanswered questions take their defaults. */
  input?: boolean;
  maxParallel?: number;
  json?: boolean;
  logFile?: string;
};

export type SyncCommandDeps = {
  createMirror?: MirrorFactory;
  prompter?: ReleasePrompter;
};

export type SyncReport = {
  result: ReconcileResult;
  summary: SummaryRow[];
  compare: CompareRow[];
  changes: ChangeSummary[];
};

// =============================================================================
// COMMAND
// =============================================================================

export async function syncCommand(
  config: ReleaseSyncConfig,
  specs: readonly RepositorySpec[],
  opts: SyncCommandOptions,
  deps: SyncCommandDeps = {},
): Promise<SyncReport> {
  const maxParallel = resolveMaxParallel(opts.maxParallel, config.max_parallel);
  const context = await resolveReleaseContext(config, opts, deps.prompter);
  const createMirror: MirrorFactory =
    deps.createMirror ?? ((spec) => new GitMirror(spec, { timeoutMs: config.git_timeout_ms }));

  if (!opts.json) {
    console.log(formatReleaseHeader(context));
  }

  const events: EventSink = opts.logFile
    ? new JsonlLogger(opts.logFile, { runId: defaultRunId() })
    : new NullEventSink();

  let result: ReconcileResult;
  try {
    result = await reconcileRepositories({
      specs,
      context,
      createMirror,
      maxParallel,
      tagHistoryLimit: config.tag_history_limit,
      events,
      onRepoSettled: opts.json ? undefined : (outcome) => console.log(formatRepoProgress(outcome)),
    });
  } finally {
    events.close();
  }

  const summary = buildSummaryRows(specs, result);
  const compare = buildCompareRows(specs, result);
  const changes = await buildChangeSummaries(
    specs,
    compare,
    (spec) => createMirror(spec),
    config.change_log_limit,
  );
  const report: SyncReport = { result, summary, compare, changes };

  if (opts.json) {
    console.log(JSON.stringify(serializeReport(report), null, 2));
  } else {
    printReport(specs, report);
  }

  if (!result.ok) {
    process.exitCode = 1;
  }
  return report;
}

// =============================================================================
// INPUT
// =============================================================================

async function resolveReleaseContext(
  config: ReleaseSyncConfig,
  opts: SyncCommandOptions,
  prompter?: ReleasePrompter,
): Promise<ReleaseContext> {
  const needsPrompt =
    opts.channel === undefined || opts.stability === undefined || opts.baseVersion === undefined;
  const interactive = opts.input !== false && needsPrompt;
  const questions = prompter ?? createReleasePrompter({ interactive, json: opts.json });

  try {
    const channel =
      opts.channel !== undefined
        ? parseChoice(ChannelSchema.options, opts.channel, "--channel")
        : await questions.choose<Channel>("Release channel", ChannelSchema.options, "external");
    const stability =
      opts.stability !== undefined
        ? parseChoice(StabilitySchema.options, opts.stability, "--stability")
        : await questions.choose<Stability>("Stability", StabilitySchema.options, "unstable");
    const baseVersion =
      opts.baseVersion ?? (await questions.ask("Base version", config.default_base_version));

    return createReleaseContext({
      channel,
      stability,
      baseVersion,
      naming: {
        versionPrefix: config.version_prefix,
        releaseBranchPrefix: config.release_branch_prefix,
      },
    });
  } finally {
    questions.close();
  }
}

function parseChoice<T extends string>(choices: readonly T[], value: string, flag: string): T {
  const match = choices.find((choice) => choice === value.trim().toLowerCase());
  if (!match) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: `Invalid ${flag} value.`,
      message: `"${value}" is not one of: ${choices.join(", ")}.`,
    });
  }
  return match;
}

function resolveMaxParallel(requested: number | undefined, fallback: number): number {
  if (requested === undefined) return fallback;
  if (!Number.isInteger(requested) || requested < 1) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid --max-parallel value.",
      message: "--max-parallel must be a positive integer.",
    });
  }
  return requested;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printReport(specs: readonly RepositorySpec[], report: SyncReport): void {
  printBlock(renderSyncStatus(specs, report.result));

  for (const spec of specs) {
    const outcome = report.result.outcomes.get(spec.name);
    if (outcome) printBlock(renderBranchTags(spec, outcome));
  }

  printBlock(renderSummary(report.summary));
  printBlock(renderCompare(report.compare));

  for (const summary of report.changes) {
    printBlock(renderChangeSummary(summary));
  }
}

function printBlock(lines: string[]): void {
  console.log("");
  for (const line of lines) {
    console.log(line);
  }
}

function serializeReport(report: SyncReport): Record<string, unknown> {
  const { context } = report.result;
  return {
    ok: report.result.ok,
    release: {
      channel: context.channel,
      stability: context.stability,
      base_version: context.baseVersion,
      version: formatVersion(context.version),
      prerelease: isPrerelease(context.version),
      release_branch: context.releaseBranch,
    },
    repositories: [...report.result.outcomes.values()].map(serializeOutcome),
    summary: report.summary,
    compare: report.compare,
    changes: report.changes,
  };
}

function serializeOutcome(outcome: RepoOutcome): Record<string, unknown> {
  return {
    name: outcome.name,
    phase: outcome.phase,
    history: outcome.history,
    ensure: outcome.ensure ?? null,
    release_branch: outcome.resolved?.releaseBranch ?? null,
    release_branch_source: outcome.resolved?.releaseBranchSource ?? null,
    synced: outcome.synced,
    failed_branches: outcome.failedBranches,
    tags: outcome.state ?? null,
    failure: outcome.failure
      ? {
          phase: outcome.failure.phase,
          kind: outcome.failure.kind,
          branch: outcome.failure.branch ?? null,
          message: outcome.failure.message,
        }
      : null,
  };
}

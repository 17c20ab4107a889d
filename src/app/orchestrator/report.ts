/**
 * Post-join views over a reconciliation result.
 * Purpose: pick the branch each repository is judged on, then derive the latest-tag
 * summary, the compare links and the change logs for the operator's channel.
 * Assumptions: called after reconcileRepositories has settled every repository.
 * Usage: buildCompareRows(specs, result); await buildChangeSummaries(specs, result, factory).
 */

import { formatErrorMessage } from "../../core/error-format.js";
import type { Channel } from "../../core/config.js";
import { patternForChannel, type RepositorySpec } from "../../core/repository-spec.js";
import type { CommitSummary } from "../../git/mirror.js";

import type { HistorySource } from "./ports.js";
import type { ReconcileResult, RepoOutcome } from "./reconcile.js";
import { latestTagOnBranch } from "./tag-collector.js";

export const DEFAULT_CHANGE_LOG_LIMIT = 20;

// =============================================================================
// TYPES
// =============================================================================

export type FailedRow = {
  repo: string;
  kind: "failed";
  error: string;
};

export type SummaryRow =
  | {
      repo: string;
      kind: "ok";
      pattern: string;
      branch: string;
      /** Newest matching tag merged into `branch`. */
      tag: string | null;
      /** Newest matching tag anywhere in the repository. */
      latestAnywhere: string | null;
    }
  | FailedRow;

export type CompareRow =
  | {
      repo: string;
      kind: "ok";
      branch: string;
      tag: string | null;
      /** Null when no tag matches; no link is made up. */
      url: string | null;
    }
  | FailedRow;

export type ChangeSummary =
  | { repo: string; kind: "no_changes"; tag: string; branch: string }
  | { repo: string; kind: "changes"; tag: string; branch: string; commits: CommitSummary[] }
  | { repo: string; kind: "error"; tag: string; branch: string; error: string };

// =============================================================================
// BRANCH SELECTION
// =============================================================================

/** The release branch when it synced, otherwise the primary branch. */
export function selectReportBranch(spec: RepositorySpec, outcome: RepoOutcome): string {
  const releaseBranch = outcome.resolved?.releaseBranch;
  if (releaseBranch && outcome.state?.branchTags[releaseBranch]) {
    return releaseBranch;
  }
  return spec.primaryBranch;
}

/** `https://host/org/repo.git`, `v1.2.3`, `main` -> `https://host/org/repo/compare/v1.2.3...main` */
export function buildCompareUrl(repoUrl: string, tag: string, branch: string): string {
  const base = repoUrl.endsWith(".git") ? repoUrl.slice(0, -".git".length) : repoUrl;
  return `${base}/compare/${tag}...${branch}`;
}

// =============================================================================
// TABLES
// =============================================================================

export function buildSummaryRows(
  specs: readonly RepositorySpec[],
  result: ReconcileResult,
  channel: Channel = result.context.channel,
): SummaryRow[] {
  return specs.flatMap((spec): SummaryRow[] => {
    const outcome = result.outcomes.get(spec.name);
    if (!outcome) return [];
    if (outcome.phase !== "done" || !outcome.state) return [failedRow(spec.name, outcome)];

    const pattern = patternForChannel(spec, channel);
    const branch = selectReportBranch(spec, outcome);
    return [
      {
        repo: spec.name,
        kind: "ok",
        pattern,
        branch,
        tag: latestTagOnBranch(outcome.state, branch, pattern),
        latestAnywhere: outcome.state.latestTags[pattern] ?? null,
      },
    ];
  });
}

export function buildCompareRows(
  specs: readonly RepositorySpec[],
  result: ReconcileResult,
  channel: Channel = result.context.channel,
): CompareRow[] {
  return buildSummaryRows(specs, result, channel).map((row): CompareRow => {
    if (row.kind === "failed") return row;

    const spec = specs.find((candidate) => candidate.name === row.repo);
    const url = spec && row.tag ? buildCompareUrl(spec.url, row.tag, row.branch) : null;
    return { repo: row.repo, kind: "ok", branch: row.branch, tag: row.tag, url };
  });
}

// =============================================================================
// CHANGE LOGS
// =============================================================================

/**
 * Commits between each repository's comparison tag and its branch tip. Rows
 * without a tag are skipped; a git failure here only affects that repository.
 */
export async function buildChangeSummaries(
  specs: readonly RepositorySpec[],
  rows: readonly CompareRow[],
  openHistory: (spec: RepositorySpec) => HistorySource,
  limit = DEFAULT_CHANGE_LOG_LIMIT,
): Promise<ChangeSummary[]> {
  const summaries: ChangeSummary[] = [];

  for (const row of rows) {
    if (row.kind !== "ok" || !row.tag) continue;
    const spec = specs.find((candidate) => candidate.name === row.repo);
    if (!spec) continue;

    summaries.push(await summarizeChanges(openHistory(spec), row.repo, row.tag, row.branch, limit));
  }

  return summaries;
}

export async function summarizeChanges(
  history: HistorySource,
  repo: string,
  tag: string,
  branch: string,
  limit = DEFAULT_CHANGE_LOG_LIMIT,
): Promise<ChangeSummary> {
  const tagRef = `refs/tags/${tag}`;
  const branchRef = `refs/heads/${branch}`;

  try {
    const [tagCommit, branchCommit] = await Promise.all([
      history.commitAt(tagRef),
      history.commitAt(branchRef),
    ]);
    if (tagCommit === branchCommit) {
      return { repo, kind: "no_changes", tag, branch };
    }

    const commits = await history.logSince(tagRef, branchRef, limit);
    return { repo, kind: "changes", tag, branch, commits: commits.slice(0, limit) };
  } catch (err) {
    return { repo, kind: "error", tag, branch, error: formatErrorMessage(err) };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function failedRow(repo: string, outcome: RepoOutcome): FailedRow {
  return {
    repo,
    kind: "failed",
    error: outcome.failure?.message ?? `stopped in phase ${outcome.phase}`,
  };
}

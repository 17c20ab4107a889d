import type { ReconcileResult, RepoOutcome } from "../app/orchestrator/reconcile.js";
import type { ChangeSummary, CompareRow, SummaryRow } from "../app/orchestrator/report.js";
import type { ReleaseContext } from "../core/release-context.js";
import type { RepositorySpec } from "../core/repository-spec.js";

import { renderTable } from "./table.js";

const NONE = "None";

// =============================================================================
// PROGRESS
// =============================================================================

export function formatRepoProgress(outcome: RepoOutcome): string {
  if (outcome.phase === "done") {
    return `✅ ${outcome.name} synced (${outcome.synced.map((entry) => entry.branch).join(", ")})`;
  }
  return `❌ ${outcome.name} failed: ${outcome.failure?.message ?? `stopped in phase ${outcome.phase}`}`;
}

export function formatReleaseHeader(context: ReleaseContext): string {
  return `Release: ${context.channel}, Stability: ${context.stability}, Version: ${context.baseVersion} (release branch ${context.releaseBranch})`;
}

// =============================================================================
// TABLES
// =============================================================================

export function renderSyncStatus(specs: readonly RepositorySpec[], result: ReconcileResult): string[] {
  const rows = specs.flatMap((spec): string[][] => {
    const outcome = result.outcomes.get(spec.name);
    if (!outcome) return [];

    const rowsForRepo = outcome.synced.map((entry) => [spec.name, entry.branch, entry.lastCommitDate]);
    for (const failed of outcome.failedBranches) {
      rowsForRepo.push([spec.name, failed.branch, `ERROR (${failed.kind}): ${failed.message}`]);
    }
    if (outcome.failure && outcome.failedBranches.length === 0) {
      rowsForRepo.push([
        spec.name,
        outcome.failure.branch ?? "-",
        `ERROR (${outcome.failure.kind}): ${outcome.failure.message}`,
      ]);
    }
    return rowsForRepo;
  });

  return renderTable({
    title: "Sync status",
    headers: ["Repository", "Branch", "Last commit"],
    rows,
  });
}

/** One table per repository: a row per branch, a column per tag pattern. */
export function renderBranchTags(spec: RepositorySpec, outcome: RepoOutcome): string[] {
  const state = outcome.state;
  if (!state) {
    return [`${spec.name}: ERROR ${outcome.failure?.message ?? "no tags collected"}`];
  }

  const rows = Object.entries(state.branchTags).map(([branch, perPattern]) => [
    branch,
    ...spec.tagPatterns.map((pattern) => {
      const tags = perPattern[pattern] ?? [];
      return tags.length > 0 ? tags.join("\n") : NONE;
    }),
  ]);
  rows.push([
    "(latest anywhere)",
    ...spec.tagPatterns.map((pattern) => state.latestTags[pattern] ?? NONE),
  ]);

  return renderTable({
    title: `Tags in ${spec.name}`,
    headers: ["Branch", ...spec.tagPatterns.map((pattern) => `${pattern}*`)],
    rows,
  });
}

export function renderSummary(rows: readonly SummaryRow[]): string[] {
  return renderTable({
    title: "Latest tags",
    headers: ["Repository", "Pattern", "Branch", "Tag on branch", "Latest anywhere"],
    rows: rows.map((row) =>
      row.kind === "failed"
        ? [row.repo, "-", "-", `ERROR: ${row.error}`, "-"]
        : [row.repo, row.pattern, row.branch, row.tag ?? NONE, row.latestAnywhere ?? NONE],
    ),
  });
}

export function renderCompare(rows: readonly CompareRow[]): string[] {
  return renderTable({
    title: "Compare",
    headers: ["Repository", "Tag", "Branch", "Compare"],
    rows: rows.map((row) =>
      row.kind === "failed"
        ? [row.repo, "-", "-", `ERROR: ${row.error}`]
        : [row.repo, row.tag ?? NONE, row.branch, row.url ?? "unavailable"],
    ),
  });
}

// =============================================================================
// CHANGE LOGS
// =============================================================================

export function renderChangeSummary(summary: ChangeSummary): string[] {
  switch (summary.kind) {
    case "no_changes":
      return [`No changes in ${summary.repo} since ${summary.tag} on ${summary.branch}`];
    case "changes":
      return [
        `Changes in ${summary.repo} since ${summary.tag} on ${summary.branch}:`,
        ...summary.commits.map((commit) => `  ${commit.sha} ${commit.subject}`),
      ];
    case "error":
      return [`Unable to list changes in ${summary.repo} since ${summary.tag}: ${summary.error}`];
  }
}

import type { TagSource } from "./ports.js";

export const DEFAULT_TAG_HISTORY_LIMIT = 7;

// =============================================================================
// TYPES
// =============================================================================

export type BranchTags = Record<string, string[]>;

export type RepoState = {
  /** branch -> pattern -> tag names merged into the branch, newest first. */
  branchTags: Record<string, BranchTags>;
  /** pattern -> newest tag anywhere in the repository. */
  latestTags: Record<string, string | null>;
};

export type CollectTagsOptions = {
  historyLimit?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Newest tags per pattern, once per branch (merged view) and once for the whole
 * repository (global view). The two views answer different questions and may
 * disagree. Tags sharing a creator timestamp come back in git's order.
 */
export async function collectTags(
  source: TagSource,
  branches: readonly string[],
  patterns: readonly string[],
  options: CollectTagsOptions = {},
): Promise<RepoState> {
  const limit = options.historyLimit ?? DEFAULT_TAG_HISTORY_LIMIT;
  const state: RepoState = { branchTags: {}, latestTags: {} };

  for (const branch of branches) {
    const perPattern: BranchTags = {};
    for (const pattern of patterns) {
      const tags = await source.tagsMatching(pattern, { mergedInto: branch, limit });
      perPattern[pattern] = tags.map((tag) => tag.name);
    }
    state.branchTags[branch] = perPattern;
  }

  for (const pattern of patterns) {
    const [latest] = await source.tagsMatching(pattern, { limit: 1 });
    state.latestTags[pattern] = latest?.name ?? null;
  }

  return state;
}

/** Newest tag for `pattern` on `branch`, or null when the branch or pattern has none. */
export function latestTagOnBranch(state: RepoState, branch: string, pattern: string): string | null {
  return state.branchTags[branch]?.[pattern]?.[0] ?? null;
}

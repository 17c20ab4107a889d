import type { ReleaseContext } from "../../core/release-context.js";
import type { RepositorySpec } from "../../core/repository-spec.js";
import { uniqueInOrder } from "../../core/utils.js";
import { greatestVersion, isPrerelease, parseVersionTag } from "../../core/version-tag.js";

import type { RemoteBranchQuery } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseBranchSource = "exact" | "latest";

export type ResolvedBranches = {
  /** Primary branch first, then the release branch when one was found. */
  branches: string[];
  releaseBranch: string | null;
  releaseBranchSource: ReleaseBranchSource | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Decide which branches of one repository take part in the release.
 * A missing release branch is not an error: the primary branch stands alone.
 */
export async function resolveReleaseBranches(
  spec: RepositorySpec,
  context: ReleaseContext,
  remote: RemoteBranchQuery,
): Promise<ResolvedBranches> {
  const primaryOnly: ResolvedBranches = {
    branches: [spec.primaryBranch],
    releaseBranch: null,
    releaseBranchSource: null,
  };

  if (!spec.wantsReleaseBranch) {
    return primaryOnly;
  }

  if (await remote.remoteBranchExists(context.releaseBranch)) {
    return withReleaseBranch(spec, context.releaseBranch, "exact");
  }

  if (spec.releaseBranchPolicy === "exact_or_latest") {
    const latest = await findLatestReleaseBranch(remote, context.naming.releaseBranchPrefix);
    if (latest) {
      return withReleaseBranch(spec, latest, "latest");
    }
  }

  return primaryOnly;
}

/**
 * Newest `<prefix>MAJOR.MINOR.PATCH` branch on the remote. Suffixes that are
 * not a plain release version (prereleases, two-part versions, words) are ignored.
 */
export async function findLatestReleaseBranch(
  remote: RemoteBranchQuery,
  prefix: string,
): Promise<string | null> {
  const candidates = await remote.listRemoteBranchesMatching(prefix);
  const stable = candidates.filter((branch) => {
    const parsed = parseVersionTag(branch, prefix);
    return parsed !== null && !isPrerelease(parsed) && parsed.build.length === 0;
  });

  return greatestVersion(stable, prefix)?.raw ?? null;
}

function withReleaseBranch(
  spec: RepositorySpec,
  releaseBranch: string,
  source: ReleaseBranchSource,
): ResolvedBranches {
  return {
    branches: uniqueInOrder([spec.primaryBranch, releaseBranch]),
    releaseBranch,
    releaseBranchSource: source,
  };
}

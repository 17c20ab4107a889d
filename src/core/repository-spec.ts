import path from "node:path";

import type { Channel, ReleaseBranchPolicy, ReleaseSyncConfig, RepositoryConfig } from "./config.js";
import { uniqueInOrder } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RepositorySpec = Readonly<{
  name: string;
  url: string;
  localPath: string;
  primaryBranch: string;
  wantsReleaseBranch: boolean;
  releaseBranchPolicy: ReleaseBranchPolicy;
  channelPatterns: Readonly<Record<Channel, string>>;
  /** External pattern, internal pattern, then any extras; no duplicates. */
  tagPatterns: readonly string[];
}>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createRepositorySpec(repo: RepositoryConfig, mirrorRoot: string): RepositorySpec {
  const channelPatterns = Object.freeze({
    external: repo.tag_patterns.external,
    internal: repo.tag_patterns.internal,
  });

  return Object.freeze({
    name: repo.name,
    url: repo.url,
    localPath: path.join(mirrorRoot, repo.name),
    primaryBranch: repo.primary_branch,
    wantsReleaseBranch: repo.track_release_branch,
    releaseBranchPolicy: repo.release_branch_policy,
    channelPatterns,
    tagPatterns: Object.freeze(
      uniqueInOrder([channelPatterns.external, channelPatterns.internal, ...repo.extra_tag_patterns]),
    ),
  });
}

/** `mirror_root` is resolved against the invocation directory. */
export function buildRepositorySpecs(config: ReleaseSyncConfig, cwd: string): RepositorySpec[] {
  const mirrorRoot = path.resolve(cwd, config.mirror_root);
  return config.repositories.map((repo) => createRepositorySpec(repo, mirrorRoot));
}

export function patternForChannel(spec: RepositorySpec, channel: Channel): string {
  return spec.channelPatterns[channel];
}

import type { Channel, Stability } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { parseVersionTag, type VersionTag } from "./version-tag.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseNaming = {
  versionPrefix: string;
  releaseBranchPrefix: string;
};

export type ReleaseContext = Readonly<{
  channel: Channel;
  stability: Stability;
  baseVersion: string;
  version: VersionTag;
  releaseBranch: string;
  naming: ReleaseNaming;
}>;

// =============================================================================
// PUBLIC API
// =============================================================================

/** `8.4.1` and `v8.4.1` both become `v8.4.1`. */
export function normalizeBaseVersion(input: string, versionPrefix: string): string {
  const trimmed = input.trim();
  return trimmed.startsWith(versionPrefix) ? trimmed : `${versionPrefix}${trimmed}`;
}

/** `v8.4.1` -> `chore_release-8.4.1` */
export function releaseBranchName(baseVersion: string, naming: ReleaseNaming): string {
  const bare = baseVersion.startsWith(naming.versionPrefix)
    ? baseVersion.slice(naming.versionPrefix.length)
    : baseVersion;
  return `${naming.releaseBranchPrefix}${bare}`;
}

export function createReleaseContext(args: {
  channel: Channel;
  stability: Stability;
  baseVersion: string;
  naming: ReleaseNaming;
}): ReleaseContext {
  const baseVersion = normalizeBaseVersion(args.baseVersion, args.naming.versionPrefix);
  const version = parseVersionTag(baseVersion, args.naming.versionPrefix);
  if (!version) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid base version.",
      message: `"${args.baseVersion}" is not a version like ${args.naming.versionPrefix}8.4.0.`,
      hint: "Pass MAJOR.MINOR.PATCH with an optional -prerelease suffix.",
    });
  }

  return Object.freeze({
    channel: args.channel,
    stability: args.stability,
    baseVersion,
    version,
    releaseBranch: releaseBranchName(baseVersion, args.naming),
    naming: { ...args.naming },
  });
}

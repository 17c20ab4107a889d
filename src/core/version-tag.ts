/**
 * Release identifiers such as `v8.4.0`, `internal@2.1.0-alpha.3` or `ot3@1.0.0+build.7`.
 *
 * A tag is a family prefix (the channel's tag pattern) followed by a semantic
 * version. Tags are only ordered against tags of the same family; anything
 * outside the grammar parses to `null` and is left out of "greatest" queries.
 */

// =============================================================================
// TYPES
// =============================================================================

export type VersionTag = {
  raw: string;
  family: string;
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build: string[];
};

const VERSION_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

const NUMERIC_IDENTIFIER = /^\d+$/;

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse a tag name. With `family` the name must start with it; without, the
 * family is the shortest prefix after which a version parses (`""` for a bare `1.2.3`).
 */
export function parseVersionTag(raw: string, family?: string): VersionTag | null {
  if (family !== undefined) {
    return raw.startsWith(family) ? buildVersionTag(raw, family) : null;
  }

  for (let i = 0; i < raw.length; i += 1) {
    if (!/\d/.test(raw[i])) continue;
    const parsed = buildVersionTag(raw, raw.slice(0, i));
    if (parsed) return parsed;
  }

  return null;
}

function buildVersionTag(raw: string, prefix: string): VersionTag | null {
  const match = VERSION_PATTERN.exec(raw.slice(prefix.length));
  if (!match) return null;

  return {
    raw,
    family: prefix,
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] ? match[4].split(".") : [],
    build: match[5] ? match[5].split(".") : [],
  };
}

export function isPrerelease(tag: VersionTag): boolean {
  return tag.prerelease.length > 0;
}

/** First prerelease identifier, e.g. `alpha` for `1.0.0-alpha.2`. */
export function prereleaseLabel(tag: VersionTag): string | null {
  return tag.prerelease[0] ?? null;
}

export function formatVersion(tag: VersionTag): string {
  const core = `${tag.major}.${tag.minor}.${tag.patch}`;
  return tag.prerelease.length > 0 ? `${core}-${tag.prerelease.join(".")}` : core;
}

// =============================================================================
// ORDERING
// =============================================================================

/**
 * Precedence comparison. Returns `null` when the tags belong to different
 * families and so have no defined order.
 */
export function compareVersionTags(a: VersionTag, b: VersionTag): number | null {
  if (a.family !== b.family) return null;

  const core = a.major - b.major || a.minor - b.minor || a.patch - b.patch;
  if (core !== 0) return Math.sign(core);

  return comparePrerelease(a.prerelease, b.prerelease);
}

/** Greatest of `names` within `family`; unparseable names are skipped. */
export function greatestVersion(names: Iterable<string>, family?: string): VersionTag | null {
  let best: VersionTag | null = null;

  for (const name of names) {
    const parsed = parseVersionTag(name, family);
    if (!parsed) continue;
    if (best === null) {
      best = parsed;
      continue;
    }
    const cmp = compareVersionTags(parsed, best);
    if (cmp !== null && cmp > 0) {
      best = parsed;
    }
  }

  return best;
}

function comparePrerelease(a: string[], b: string[]): number {
  // A release outranks any of its prereleases.
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const cmp = compareIdentifier(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }

  return Math.sign(a.length - b.length);
}

function compareIdentifier(a: string, b: string): number {
  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);

  if (aNumeric && bNumeric) return Math.sign(Number(a) - Number(b));
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

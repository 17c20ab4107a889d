/**
 * Robot system release metadata (`releases.json`).
 * Production entries are grouped by prerelease label; versions outside the
 * semantic-version grammar are skipped rather than failing the document.
 */

import { z } from "zod";

import {
  compareVersionTags,
  parseVersionTag,
  prereleaseLabel,
  type VersionTag,
} from "../../core/version-tag.js";

import { fetchEndpoints, type EndpointResult, type FetchOptions } from "./fetch.js";

const RobotReleaseEntrySchema = z.object({
  fullImage: z.string(),
  system: z.string(),
  version: z.string(),
  releaseNotes: z.string().default(""),
});

const RobotReleasesDocSchema = z.object({
  production: z.record(RobotReleaseEntrySchema).default({}),
});

export type RobotRelease = {
  version: string;
  fullImage: string;
  system: string;
  versionUrl: string;
  releaseNotes: string;
};

export type RobotTrack = "alpha" | "beta" | "stable";

export const ROBOT_TRACKS: readonly RobotTrack[] = ["alpha", "beta", "stable"];

export type RobotReleaseCollection = Record<RobotTrack, RobotRelease[]>;

export function parseRobotReleases(text: string): RobotReleaseCollection {
  const doc = RobotReleasesDocSchema.parse(JSON.parse(text));
  const production = Object.entries(doc.production);
  if (production.length === 0) {
    throw new Error("no 'production' entries in JSON");
  }

  const collection: RobotReleaseCollection = { alpha: [], beta: [], stable: [] };
  for (const [version, entry] of production) {
    const parsed = parseVersionTag(version, "");
    if (!parsed) continue;

    const track = trackOf(parsed);
    if (!track) continue;

    collection[track].push({
      version,
      fullImage: entry.fullImage,
      system: entry.system,
      versionUrl: entry.version,
      releaseNotes: entry.releaseNotes,
    });
  }

  return collection;
}

export function latestRelease(releases: readonly RobotRelease[]): RobotRelease | null {
  let best: { release: RobotRelease; version: VersionTag } | null = null;

  for (const release of releases) {
    const version = parseVersionTag(release.version, "");
    if (!version) continue;
    const cmp = best ? compareVersionTags(version, best.version) : 1;
    if (cmp !== null && cmp > 0) {
      best = { release, version };
    }
  }

  return best?.release ?? null;
}

export async function fetchRobotReleases(
  endpoints: Record<string, string>,
  options: FetchOptions = {},
): Promise<EndpointResult<RobotReleaseCollection>[]> {
  return fetchEndpoints(endpoints, parseRobotReleases, options);
}

function trackOf(version: VersionTag): RobotTrack | null {
  const label = prereleaseLabel(version);
  if (label === null) return "stable";
  if (label === "alpha" || label === "beta") return label;
  return null;
}

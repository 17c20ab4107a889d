import { fetchAppManifests, type AppManifest } from "../app/manifests/app-manifest.js";
import type { EndpointResult, FetchLike } from "../app/manifests/fetch.js";
import {
  fetchRobotReleases,
  latestRelease,
  ROBOT_TRACKS,
  type RobotReleaseCollection,
} from "../app/manifests/robot-releases.js";
import { ChannelSchema, type Channel, type ReleaseSyncConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { renderTable } from "./table.js";

export type ManifestsCommandOptions = {
  channel?: string;
  json?: boolean;
};

export type ManifestsReport = {
  channel: Channel;
  app: EndpointResult<AppManifest>[];
  robot: EndpointResult<RobotReleaseCollection>[];
};

// =============================================================================
// COMMAND
// =============================================================================

export async function manifestsCommand(
  config: ReleaseSyncConfig,
  opts: ManifestsCommandOptions,
  deps: { fetchImpl?: FetchLike } = {},
): Promise<ManifestsReport> {
  const channel = resolveChannel(opts.channel);
  const fetchOptions = { fetchImpl: deps.fetchImpl, timeoutMs: config.manifests.timeout_ms };

  const [app, robot] = await Promise.all([
    fetchAppManifests(config.manifests.app[channel], fetchOptions),
    fetchRobotReleases(config.manifests.robot[channel], fetchOptions),
  ]);
  const report: ManifestsReport = { channel, app, robot };

  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of [
      ...renderAppManifests(app),
      "",
      ...renderRobotReleases(robot),
    ]) {
      console.log(line);
    }
  }

  const results = [...app, ...robot];
  const failed = results.filter((entry) => !entry.ok);
  if (results.length > 0 && failed.length === results.length) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.manifest,
      title: "No release manifests could be fetched.",
      message: `All ${results.length} ${channel} endpoints failed.`,
      hint: "Check your network connection and the endpoint URLs under manifests in the config.",
    });
  }
  if (failed.length > 0) {
    process.exitCode = 1;
  }
  return report;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function renderAppManifests(results: readonly EndpointResult<AppManifest>[]): string[] {
  return renderTable({
    title: "App manifests",
    headers: ["Manifest", "Version", "Release date", "Path"],
    rows: results.map((result) =>
      result.ok
        ? [
            result.label,
            result.value.version,
            formatReleaseDate(result.value.releaseDate),
            result.value.path,
          ]
        : [result.label, "ERROR", result.error, result.url],
    ),
  });
}

export function renderRobotReleases(
  results: readonly EndpointResult<RobotReleaseCollection>[],
): string[] {
  return renderTable({
    title: "Robot releases",
    headers: ["Source", ...ROBOT_TRACKS],
    rows: results.map((result) =>
      result.ok
        ? [
            result.label,
            ...ROBOT_TRACKS.map((track) => latestRelease(result.value[track])?.version ?? "None"),
          ]
        : [result.label, "ERROR", result.error, result.url],
    ),
  });
}

/** ISO timestamps are shown as `YYYY-MM-DD HH:MM UTC`; anything else as given. */
export function formatReleaseDate(value: string | null): string {
  if (!value) return "-";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

function resolveChannel(value: string | undefined): Channel {
  const parsed = ChannelSchema.safeParse(value ?? "external");
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid --channel value.",
      message: `"${value}" is not one of: ${ChannelSchema.options.join(", ")}.`,
    });
  }
  return parsed.data;
}

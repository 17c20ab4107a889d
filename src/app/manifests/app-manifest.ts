/**
 * Desktop app update manifests (`latest.yml`, `beta-mac.yml`, ...).
 * Only the fields shown to the operator are kept; file entries missing
 * `url`, `sha512` or `size` are dropped.
 */

import yaml from "js-yaml";
import { z } from "zod";

import { fetchEndpoints, type EndpointResult, type FetchOptions } from "./fetch.js";

const AppFileSchema = z.object({
  url: z.string(),
  sha512: z.string(),
  size: z.number(),
});

export type AppFile = z.infer<typeof AppFileSchema>;

// js-yaml turns unquoted timestamps into Date objects.
const DateStringSchema = z.union([z.string(), z.date().transform((date) => date.toISOString())]);

const AppManifestDocSchema = z.object({
  version: z.union([z.string(), z.number().transform(String)]),
  files: z.array(z.unknown()).default([]),
  path: z.string(),
  sha512: z.string(),
  releaseNotes: z.string().nullish(),
  releaseDate: DateStringSchema.nullish(),
});

export type AppManifest = {
  version: string;
  files: AppFile[];
  path: string;
  sha512: string;
  releaseNotes: string;
  releaseDate: string | null;
};

export function parseAppManifest(text: string): AppManifest {
  const doc = AppManifestDocSchema.parse(yaml.load(text));

  const files = doc.files.flatMap((entry) => {
    const parsed = AppFileSchema.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  });

  return {
    version: doc.version,
    files,
    path: doc.path,
    sha512: doc.sha512,
    releaseNotes: doc.releaseNotes ?? "",
    releaseDate: doc.releaseDate ?? null,
  };
}

export async function fetchAppManifests(
  endpoints: Record<string, string>,
  options: FetchOptions = {},
): Promise<EndpointResult<AppManifest>[]> {
  return fetchEndpoints(endpoints, parseAppManifest, options);
}

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ReleaseSyncConfigSchema, type ReleaseSyncConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const CONFIG_FILE_NAME = "release-sync.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(
      /\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/gi,
      (_match, varName: string, fallback: string | undefined) => {
        const envValue = process.env[varName] ?? fallback;
        if (envValue === undefined) {
          const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
          throw new ConfigError(
            `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
          );
        }
        return envValue;
      },
    );
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${CONFIG_FILE_NAME} in the working directory or pass --config <path>.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;

  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config missing.",
    message: `Release config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    next: `Edit ${configPath}`,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// DISCOVERY
// =============================================================================

export type ResolveConfigPathArgs = {
  explicitPath?: string;
  cwd: string;
};

/**
 * `--config` wins, then `release-sync.yaml` in the working directory, then the
 * file shipped with the package.
 */
export function resolveConfigPath(args: ResolveConfigPathArgs): string {
  if (args.explicitPath) {
    return path.resolve(args.cwd, args.explicitPath);
  }

  const local = path.join(args.cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(local)) {
    return local;
  }

  return findPackagedConfig() ?? local;
}

function findPackagedConfig(): string | null {
  // Source runs from src/core, builds from dist/src/core.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth += 1) {
    const candidate = path.join(dir, "config", CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }
  return null;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadReleaseSyncConfig(configPath: string): ReleaseSyncConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read release config at ${absolutePath}`, err);
    }

    return parseReleaseSyncConfig(raw, absolutePath);
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function parseReleaseSyncConfig(raw: string, source: string): ReleaseSyncConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${source}${locationDetail}: ${detail}`, err);
  }

  const expanded = expandEnv(doc, { file: source, trail: [] });

  const parsed = ReleaseSyncConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid release config at ${source}:\n${details}`, parsed.error);
  }

  return parsed.data;
}

import { z } from "zod";

export const ChannelSchema = z.enum(["external", "internal"]);
export type Channel = z.infer<typeof ChannelSchema>;

export const StabilitySchema = z.enum(["stable", "unstable"]);
export type Stability = z.infer<typeof StabilitySchema>;

export const ReleaseBranchPolicySchema = z.enum(["exact", "exact_or_latest"]);
export type ReleaseBranchPolicy = z.infer<typeof ReleaseBranchPolicySchema>;

const TagPatternsSchema = z
  .object({
    external: z.string().min(1),
    internal: z.string().min(1),
  })
  .strict();

const RepositorySchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/, "Repository names become directory names"),
    url: z.string().min(1),
    primary_branch: z.string().min(1).default("main"),
    // Also track the release-preparation branch derived from the base version.
    track_release_branch: z.boolean().default(true),
    release_branch_policy: ReleaseBranchPolicySchema.default("exact"),
    tag_patterns: TagPatternsSchema,
    extra_tag_patterns: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type RepositoryConfig = z.infer<typeof RepositorySchema>;

// label -> URL
const EndpointTableSchema = z.record(z.string().url());

const ChannelEndpointsSchema = z
  .object({
    external: EndpointTableSchema.default({}),
    internal: EndpointTableSchema.default({}),
  })
  .strict();

const ManifestsSchema = z
  .object({
    app: ChannelEndpointsSchema.default({}),
    robot: ChannelEndpointsSchema.default({}),
    timeout_ms: z.number().int().positive().default(10_000),
  })
  .strict();

export type ManifestEndpointsConfig = z.infer<typeof ManifestsSchema>;

export const ReleaseSyncConfigSchema = z
  .object({
    version_prefix: z.string().min(1).default("v"),
    release_branch_prefix: z.string().min(1).default("chore_release-"),
    default_base_version: z.string().min(1).default("v8.4.0"),

    mirror_root: z.string().min(1).default("."),
    max_parallel: z.number().int().positive().default(5),
    git_timeout_ms: z.number().int().positive().default(120_000),

    tag_history_limit: z.number().int().positive().default(7),
    change_log_limit: z.number().int().positive().default(20),

    repositories: z.array(RepositorySchema).min(1),
    manifests: ManifestsSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.repositories.forEach((repo, index) => {
      if (seen.has(repo.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["repositories", index, "name"],
          message: `Duplicate repository name "${repo.name}"`,
        });
      }
      seen.add(repo.name);
    });
  });

export type ReleaseSyncConfig = z.infer<typeof ReleaseSyncConfigSchema>;

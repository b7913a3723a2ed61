import { z } from 'zod';

// Hosts, repos, features and llm ids end up in paths and session keys
const namePattern = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const NameSchema = z.string().regex(namePattern, {
  message: 'Names may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit',
});

// Relative path inside a worktree, never escaping it
const SubdirSchema = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith('/') && !value.split('/').includes('..'), {
    message: 'Subdirectory must be a relative path inside the worktree',
  });

const BranchSchema = z
  .string()
  .min(1)
  .refine((value) => !/[\s~^:?*[\\]/.test(value) && !value.startsWith('-'), {
    message: 'Not a valid branch name',
  });

export const HostConfigSchema = z.object({
  name: NameSchema,
  address: z.string().min(1),
  tags: z.array(z.string().min(1)).default([]),
  env: z
    .record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'Not a valid environment variable name' }), z.string())
    .default({}),
});

export const RepoConfigSchema = z.object({
  name: NameSchema,
  url: z.string().min(1),
  baseBranch: BranchSchema.default('main'),
  anchorSubdir: SubdirSchema.optional(),
});

export const AttachmentSchema = z.object({
  repo: NameSchema,
  hosts: z.array(NameSchema).min(1, { message: 'Attachment must include at least one host' }),
  subdir: SubdirSchema.optional(),
  composeFile: SubdirSchema.optional(),
});

export const FeatureConfigSchema = z.object({
  name: NameSchema,
  baseBranch: BranchSchema.optional(),
  attachments: z.array(AttachmentSchema).default([]),
});

export const ReachabilityPolicySchema = z.object({
  attempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(5000),
});

export const SettingsSchema = z.object({
  remoteRoot: z.string().min(1).default('~/.sf'),
  lockTimeoutMs: z.number().int().min(0).default(60000),
  commandTimeoutMs: z.number().int().min(1000).default(600000),
  maxParallelHosts: z.number().int().min(1).max(64).default(4),
  reachability: ReachabilityPolicySchema.default({}),
  detachPolicy: z.enum(['orphan', 'teardown']).default('orphan'),
});

export const SfConfigSchema = z.object({
  hosts: z.record(z.string(), HostConfigSchema).default({}),
  repos: z.record(z.string(), RepoConfigSchema).default({}),
  llms: z.record(z.string(), z.string().min(1)).default({}),
  settings: SettingsSchema.default({}),
});

export const StateExportSchema = z.object({
  version: z.literal(1),
  exportedAt: z.string().optional(),
  config: SfConfigSchema,
  features: z.record(z.string(), FeatureConfigSchema).default({}),
});

export type HostConfig = z.infer<typeof HostConfigSchema>;
export type RepoConfig = z.infer<typeof RepoConfigSchema>;
export type Attachment = z.infer<typeof AttachmentSchema>;
export type FeatureConfig = z.infer<typeof FeatureConfigSchema>;
export type ReachabilityPolicy = z.infer<typeof ReachabilityPolicySchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type SfConfig = z.infer<typeof SfConfigSchema>;
export type StateExport = z.infer<typeof StateExportSchema>;

/** Input shapes, where defaulted fields may be omitted. */
export type HostInput = z.input<typeof HostConfigSchema>;
export type RepoInput = z.input<typeof RepoConfigSchema>;
export type StateExportInput = z.input<typeof StateExportSchema>;

/**
 * Request bodies accepted by the HTTP surface.
 */
export const SyncRequestSchema = z.object({
  feature: NameSchema,
  repos: z.array(NameSchema).optional(),
  hosts: z.array(NameSchema).optional(),
  dryRun: z.boolean().default(false),
});

export const SessionRequestSchema = z.object({
  feature: NameSchema,
  repo: NameSchema,
  llm: NameSchema.default('claude'),
  host: NameSchema.optional(),
  subdir: SubdirSchema.optional(),
  command: z.string().min(1).optional(),
  force: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});

export const PromptRequestSchema = z.object({
  feature: NameSchema,
  repo: NameSchema,
  llm: NameSchema.default('claude'),
  include: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string().min(1)).default([]),
  promptFile: z.string().min(1).optional(),
  maxBytes: z.number().int().min(1).optional(),
  host: NameSchema.optional(),
});

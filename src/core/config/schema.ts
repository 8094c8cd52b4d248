/**
 * Schema for the tool settings file (.stackweave/config.yaml).
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** One level of the configuration hierarchy. */
export const HierarchyLevelSchema = z.object({
  name: z.string().min(1),
  file: z.string().min(1),
  required: z.boolean().default(false),
});

/** Directory-walk hierarchy settings. Levels are ordered root-most first. */
export const HierarchySettingsSchema = z.object({
  /** Marker file identifying the hierarchy root directory */
  root_file: z.string().default('root.yaml'),
  levels: z.array(HierarchyLevelSchema).default([
    { name: 'root', file: 'root.yaml', required: false },
    { name: 'account', file: 'account.yaml', required: true },
    { name: 'region', file: 'region.yaml', required: false },
    { name: 'environment', file: 'env.yaml', required: false },
  ]),
});

/** What to do when a negative filter excludes a unit the selection needs. */
export const ExclusionPolicySchema = z.enum(['reinclude', 'error']);

/** Scheduler settings. */
export const ExecutionSettingsSchema = z.object({
  parallelism: z.number().int().min(1).default(4),
  ignore_errors: z.boolean().default(false),
  /** Directory (relative to the stack file) receiving generated unit directories */
  output_dir: z.string().default('.stackweave-stack'),
  exclusion_policy: ExclusionPolicySchema.default('reinclude'),
});

/** Remote state layout. */
export const StateSettingsSchema = z.object({
  /** Bucket name template, evaluated against the merged hierarchy config */
  bucket: z.string().default('${config.account_name}-${config.env}-tfstate'),
  /** State object name appended to the unit path */
  key_file: z.string().default('terraform.tfstate'),
  /** Backend type written to backend.tf.json */
  backend: z.string().default('s3'),
  /** Extra backend settings (region, encrypt, ...) */
  backend_config: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
});

/** Infrastructure engine invocation. */
export const ExecutorSettingsSchema = z.object({
  binary: z.string().default('tofu'),
  /** Per-command timeout in milliseconds (0 disables) */
  timeout_ms: z.number().int().min(0).default(0),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Stack definition file name, relative to the working directory */
  stack_file: z.string().default('stack.yaml'),
  hierarchy: withDefaults(HierarchySettingsSchema),
  execution: withDefaults(ExecutionSettingsSchema),
  state: withDefaults(StateSettingsSchema),
  executor: withDefaults(ExecutorSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

/** A config file that is empty or only comments parses as null. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

// Type exports (inferred from schemas)
export type HierarchyLevel = z.infer<typeof HierarchyLevelSchema>;
export type HierarchySettings = z.infer<typeof HierarchySettingsSchema>;
export type ExclusionPolicy = z.infer<typeof ExclusionPolicySchema>;
export type ExecutionSettings = z.infer<typeof ExecutionSettingsSchema>;
export type StateSettings = z.infer<typeof StateSettingsSchema>;
export type ExecutorSettings = z.infer<typeof ExecutorSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

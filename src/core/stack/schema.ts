/**
 * Schema for stack definition files (stack.yaml).
 */
import { z } from 'zod';
import { UNIT_ACTIONS } from '../actions.js';

/** A boolean, or an expression string evaluated before scheduling. */
const FlagSchema = z.union([z.boolean(), z.string()]);

/** Explicit dependency block on a unit. */
export const DependencyBlockSchema = z.object({
  /** Relative path of the provider (e.g. ../vpc); defaults to the block key as a unit name */
  path: z.string().min(1).optional(),
  enabled: FlagSchema.default(true),
  skip_outputs: FlagSchema.default(false),
  mock_outputs: z.record(z.string(), z.unknown()).optional(),
  mock_outputs_allowed_actions: z.array(z.enum(UNIT_ACTIONS)).optional(),
});

/** A unit declaration. */
export const UnitDefinitionSchema = z.object({
  name: z.string().min(1),
  /** Template location: [getter::]location[//subpath][?ref=version] */
  source: z.string().min(1),
  /** Output path relative to the stack's output directory; defaults to the name */
  path: z.string().min(1).optional(),
  values: z.record(z.string(), z.unknown()).default({}),
  dependencies: z.record(z.string(), DependencyBlockSchema).default({}),
  /** Relative paths in values that must stay plain strings */
  skip_references: z.array(z.string()).default([]),
});

export const StackDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  locals: z.record(z.string(), z.unknown()).default({}),
  units: z.array(UnitDefinitionSchema).default([]),
});

export type DependencyBlock = z.infer<typeof DependencyBlockSchema>;
export type UnitDefinition = z.infer<typeof UnitDefinitionSchema>;
export type StackDefinition = z.infer<typeof StackDefinitionSchema>;

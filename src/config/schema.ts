/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const includeExcludeSchema = z.object({
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
});

export const fusionConfigSchema = z.object({
  /** Output file, relative to the challenge directory */
  output: z.string().optional(),
  /** Decision for trait-free impl items nobody configured */
  default_impl_items: z.enum(['include', 'exclude']).optional(),
  interactive: z.boolean().default(true),
});

export const cratesConfigSchema = z.object({
  /** Root file of the binary crate, overrides Cargo.toml */
  bin: z.string().optional(),
  /** Library crate name to root file */
  libs: z.record(z.string(), z.string()).default({}),
});

export const configSchema = z.object({
  impl_items: includeExcludeSchema.default({}),
  impl_blocks: includeExcludeSchema.default({}),
  fusion: fusionConfigSchema.default({}),
  crates: cratesConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type IncludeExclude = z.infer<typeof includeExcludeSchema>;
export type FusionConfig = z.infer<typeof fusionConfigSchema>;
export type CratesConfig = z.infer<typeof cratesConfigSchema>;

/**
 * Configuration file writer
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { generateConfigContent } from '../templates/config-template.js';
import type { RecordedDecision } from '../resolution/config-targets.js';
import type { Config } from './schema.js';

function sorted(values: string[]): string[] {
  return Array.from(new Set(values)).sort();
}

/**
 * Merge recorded decisions into the impl_items lists. A pattern in both lists
 * stays only in include; superseded patterns are dropped.
 */
export function applyDecisions(config: Config, decisions: RecordedDecision[]): Config {
  const replaced = new Set(decisions.flatMap(d => (d.replaces ? [d.replaces] : [])));
  const keep = (pattern: string) => !replaced.has(pattern);

  const include = sorted([
    ...config.impl_items.include.filter(keep),
    ...decisions.filter(d => d.decision === 'include').map(d => d.pattern),
  ]);
  const exclude = sorted([
    ...config.impl_items.exclude.filter(keep),
    ...decisions.filter(d => d.decision === 'exclude').map(d => d.pattern),
  ]).filter(pattern => !include.includes(pattern));

  return { ...config, impl_items: { include, exclude } };
}

/**
 * Serialize a configuration to TOML, omitting unset options
 */
export function stringifyConfig(config: Config): string {
  const fusion: TOML.JsonMap = { interactive: config.fusion.interactive };
  if (config.fusion.output) fusion.output = config.fusion.output;
  if (config.fusion.default_impl_items) fusion.default_impl_items = config.fusion.default_impl_items;

  const document: TOML.JsonMap = {
    impl_items: {
      include: sorted(config.impl_items.include),
      exclude: sorted(config.impl_items.exclude),
    },
    impl_blocks: {
      include: sorted(config.impl_blocks.include),
      exclude: sorted(config.impl_blocks.exclude),
    },
    fusion,
  };

  const libs = Object.entries(config.crates.libs);
  if (config.crates.bin || libs.length > 0) {
    const crates: TOML.JsonMap = { libs: Object.fromEntries(libs) };
    if (config.crates.bin) crates.bin = config.crates.bin;
    document.crates = crates;
  }

  return TOML.stringify(document);
}

export async function writeConfig(configPath: string, config: Config): Promise<void> {
  const absolutePath = path.resolve(configPath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, generateConfigContent(stringifyConfig(config)), 'utf-8');
}

/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { ConfigFileError } from '../errors.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = ['crate-fusion.toml', '.crate-fusion.toml'];

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigFileError(`Config file not found: ${absolutePath}`, absolutePath);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = TOML.parse(content);
  } catch {
    throw new ConfigFileError(`Invalid TOML in config file: ${absolutePath}`, absolutePath);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigFileError(`Invalid configuration in ${absolutePath}:\n${errors}`, absolutePath);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Path of the nearest configuration file, walking up from `startDir`
 */
export function findConfigPath(startDir: string): string | null {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return configPath;
      }
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function findConfig(startDir: string): Promise<Config | null> {
  const configPath = findConfigPath(startDir);
  return configPath ? loadConfig(configPath) : null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

/**
 * Merge impl item patterns given on the command line into a configuration
 */
export function mergeImplOptions(
  config: Config,
  options: { include?: string[]; exclude?: string[]; defaultImplItems?: 'include' | 'exclude' }
): Config {
  return {
    ...config,
    impl_items: {
      include: unique([...config.impl_items.include, ...(options.include ?? [])]),
      exclude: unique([...config.impl_items.exclude, ...(options.exclude ?? [])]),
    },
    fusion: {
      ...config.fusion,
      default_impl_items: options.defaultImplItems ?? config.fusion.default_impl_items,
    },
  };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export { configSchema, type Config } from './schema.js';

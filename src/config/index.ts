/**
 * Config module exports
 */

export {
  configSchema,
  includeExcludeSchema,
  fusionConfigSchema,
  cratesConfigSchema,
  type Config,
  type IncludeExclude,
  type FusionConfig,
  type CratesConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  loadConfig,
  getDefaultConfig,
  findConfig,
  findConfigPath,
  loadConfigOrDefault,
  mergeImplOptions,
} from './loader.js';

export { applyDecisions, stringifyConfig, writeConfig } from './writer.js';

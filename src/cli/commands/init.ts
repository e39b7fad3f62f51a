/**
 * init command - Write a documented configuration file for a challenge
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, getDefaultConfig } from '../../config/loader.js';
import { writeConfig } from '../../config/writer.js';
import { readManifest } from '../../crates/manifest.js';
import { colors, log, logHeader, logInfo, logSuccess, logWarning } from '../output.js';

interface InitOptions {
  force?: boolean;
  output?: string;
}

export const initCommand = new Command('init')
  .description('Create a crate-fusion.toml in a challenge directory')
  .argument('[directory]', 'Challenge directory', '.')
  .option('-f, --force', 'Overwrite an existing configuration file', false)
  .option('-o, --output <path>', 'Output file to record in the configuration')
  .action(async (directory: string, options: InitOptions) => {
    const challengeDir = path.resolve(directory);
    const configPath = path.join(challengeDir, CONFIG_FILE_NAMES[0] ?? 'crate-fusion.toml');

    logHeader('crate-fusion Setup');

    try {
      if (fs.existsSync(configPath) && !options.force) {
        logWarning(`${path.basename(configPath)} already exists (use --force to overwrite)`);
        return;
      }

      const config = getDefaultConfig();
      if (options.output) {
        config.fusion.output = options.output;
      }

      await writeConfig(configPath, config);
      logSuccess(`Created ${path.basename(configPath)}`);

      if (fs.existsSync(path.join(challengeDir, 'Cargo.toml'))) {
        const manifest = await readManifest(challengeDir);
        const libs = manifest.pathDependencies.map(d => d.name);
        logInfo(`Challenge '${manifest.name}'${libs.length > 0 ? ` with local libraries: ${libs.join(', ')}` : ''}`);
      } else {
        logWarning('No Cargo.toml found; set [crates] bin and libs in the configuration');
      }

      log(`\nRun ${colors.bold}crate-fusion fuse ${directory}${colors.reset} to build the fused file.\n`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

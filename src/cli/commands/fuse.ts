/**
 * fuse command - Fuse a challenge and its local library crates into one file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { findConfigPath, getDefaultConfig, loadConfig, mergeImplOptions } from '../../config/loader.js';
import { defaultOutputPath, fuseCrates, resolveCrateSources } from '../../fusion/pipeline.js';
import { ReadlineDialog } from '../../dialog/readline-dialog.js';
import { DialogResolutionProvider } from '../../dialog/impl-dialog.js';
import { runSaveDialog } from '../../dialog/save-dialog.js';
import type { Diagnostic } from '../../types/index.js';
import { colors, log, logInfo, logSuccess, logWarning } from '../output.js';

interface FuseCommandOptions {
  config?: string;
  output?: string;
  bin?: string;
  lib?: string[];
  includeImplItem?: string[];
  excludeImplItem?: string[];
  processAllImplItems?: string;
  batch?: boolean;
  save: boolean;
  verbose?: boolean;
}

export function parseLibOptions(values: string[] = []): Record<string, string> {
  const libs: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf('=');
    if (separator <= 0 || separator === value.length - 1) {
      throw new Error(`Invalid --lib '${value}', expected <name>=<path to lib.rs>`);
    }
    libs[value.slice(0, separator)] = value.slice(separator + 1);
  }
  return libs;
}

function parseDefaultDecision(value: string | undefined): 'include' | 'exclude' | undefined {
  if (value === undefined) return undefined;
  if (value === 'include' || value === 'exclude') return value;
  throw new Error(`Invalid --process-all-impl-items '${value}', expected 'include' or 'exclude'`);
}

function printDiagnostics(diagnostics: Diagnostic[], verbose: boolean): void {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'warning') {
      logWarning(`${diagnostic.code}: ${diagnostic.message}`);
    } else if (verbose) {
      logInfo(`${colors.dim}${diagnostic.code}:${colors.reset} ${diagnostic.message}`);
    }
  }
}

export const fuseCommand = new Command('fuse')
  .description('Fuse a challenge binary and its local library crates into a single file')
  .argument('[directory]', 'Challenge directory containing Cargo.toml', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <path>', 'Path of the fused output file')
  .option('-b, --bin <name|path>', 'Binary target name, or path of the binary root file')
  .option('-l, --lib <name=path...>', 'Library crate root files, e.g. my_lib=../my_lib/src/lib.rs')
  .option('-j, --include-impl-item <patterns...>', 'Impl item patterns to include')
  .option('-x, --exclude-impl-item <patterns...>', 'Impl item patterns to exclude')
  .option('-r, --process-all-impl-items <decision>', "Decide unconfigured impl items: 'include' or 'exclude'")
  .option('--batch', 'Never ask; fail on impl items the configuration does not settle', false)
  .option('--no-save', 'Do not offer to save dialog decisions')
  .option('--verbose', 'Show verbose output', false)
  .action(async (directory: string, options: FuseCommandOptions) => {
    const challengeDir = path.resolve(directory);
    let dialog: ReadlineDialog | null = null;

    try {
      const configPath = options.config ? path.resolve(options.config) : findConfigPath(challengeDir);
      const loaded = configPath ? await loadConfig(configPath) : getDefaultConfig();
      const config = mergeImplOptions(loaded, {
        include: options.includeImplItem,
        exclude: options.excludeImplItem,
        defaultImplItems: parseDefaultDecision(options.processAllImplItems),
      });

      const { name, sources } = await resolveCrateSources(challengeDir, config, {
        bin: options.bin,
        libs: parseLibOptions(options.lib),
      });

      console.log(`Fusing ${name} (${sources.length} crate${sources.length === 1 ? '' : 's'})...\n`);
      if (options.verbose) {
        if (configPath) log(`  Config: ${configPath}`);
        for (const source of sources) {
          log(`  ${source.kind.padEnd(4)} ${source.name}: ${source.rootFile}`);
        }
        log('');
      }

      const interactive = !options.batch && config.fusion.interactive;
      dialog = interactive ? new ReadlineDialog() : null;

      const result = await fuseCrates(sources, {
        config,
        provider: dialog ? new DialogResolutionProvider(dialog) : undefined,
      });

      for (const loadedCrate of result.crates) {
        for (const warning of loadedCrate.warnings) {
          logWarning(`${warning.file}:${warning.error.line ?? 0}: ${warning.error.message}`);
        }
      }
      printDiagnostics(result.resolution.diagnostics, options.verbose ?? false);

      const outputPath = options.output
        ? path.resolve(options.output)
        : config.fusion.output
          ? path.resolve(challengeDir, config.fusion.output)
          : defaultOutputPath(challengeDir, name);

      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, result.output, 'utf-8');

      const required = result.resolution.required.size;
      logSuccess(`Fused ${required} of ${result.catalog.size} items into ${path.relative(process.cwd(), outputPath) || outputPath}`);

      if (dialog && options.save) {
        const saved = await runSaveDialog(dialog, {
          decisions: result.resolution.operatorDecisions,
          config: loaded,
          configPath,
          challengeDir,
        });
        if (saved) logSuccess(`Saved impl decisions to ${saved}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    } finally {
      dialog?.close();
    }
  });

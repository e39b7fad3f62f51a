/**
 * impls command - List impl blocks by their fully qualified names
 */

import { Command } from 'commander';
import path from 'node:path';
import { findConfigPath, getDefaultConfig, loadConfig } from '../../config/loader.js';
import { loadCrates } from '../../crates/loader.js';
import { ItemCatalog } from '../../catalog/item-catalog.js';
import { resolveCrateSources } from '../../fusion/pipeline.js';
import { rankCandidates } from '../../dialog/fuzzy.js';
import { isTraitImpl, type ImplBlock } from '../../types/index.js';
import { colors, log } from '../output.js';

interface ImplsOptions {
  config?: string;
  bin?: string;
  query?: string;
  items?: boolean;
}

function formatBlock(block: ImplBlock, catalog: ItemCatalog, challengeDir: string, showItems: boolean): string[] {
  const marker = isTraitImpl(block) ? `${colors.yellow}trait${colors.reset}` : `${colors.dim}inherent${colors.reset}`;
  const location = `${path.relative(challengeDir, block.location.filePath)}:${block.location.line}`;
  const lines = [`${colors.cyan}${block.qualifiedName}${colors.reset}  ${marker}  ${colors.dim}${location}${colors.reset}`];

  if (showItems) {
    for (const child of catalog.childrenOf(block.id)) {
      lines.push(`    ${child.name}`);
    }
  }
  return lines;
}

export const implsCommand = new Command('impls')
  .description('List the impl blocks of a challenge and its libraries by fully qualified name')
  .argument('[directory]', 'Challenge directory containing Cargo.toml', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-b, --bin <name|path>', 'Binary target name, or path of the binary root file')
  .option('-q, --query <text>', 'Fuzzy filter on the block names')
  .option('--no-items', 'Do not list the items of each block')
  .action(async (directory: string, options: ImplsOptions) => {
    const challengeDir = path.resolve(directory);

    try {
      const configPath = options.config ? path.resolve(options.config) : findConfigPath(challengeDir);
      const config = configPath ? await loadConfig(configPath) : getDefaultConfig();
      const { sources } = await resolveCrateSources(challengeDir, config, { bin: options.bin });

      const loaded = await loadCrates(sources);
      const catalog = ItemCatalog.build(loaded.map(l => l.crate));
      const blocks = catalog.implBlocks();

      const selected = options.query
        ? rankCandidates(blocks.map(b => b.qualifiedName), options.query).flatMap(r => {
            const block = blocks[r.index];
            return block ? [block] : [];
          })
        : blocks;

      if (selected.length === 0) {
        log(options.query ? `No impl blocks match '${options.query}'.` : 'No impl blocks found.');
        return;
      }

      let currentCrate: string | null = null;
      for (const block of selected) {
        const crateLabel = `${block.crateKind} ${block.crate}`;
        if (!options.query && crateLabel !== currentCrate) {
          log(`\n${colors.bold}${crateLabel}${colors.reset}`);
          currentCrate = crateLabel;
        }
        for (const line of formatBlock(block, catalog, challengeDir, options.items !== false)) {
          log(`  ${line}`);
        }
      }
      log(`\n${selected.length} impl block${selected.length === 1 ? '' : 's'}`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

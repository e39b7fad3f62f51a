#!/usr/bin/env node

/**
 * crate-fusion CLI
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { fuseCommand } from './commands/fuse.js';
import { implsCommand } from './commands/impls.js';

const program = new Command();

program
  .name('crate-fusion')
  .description('Fuse a Rust challenge and its local library crates into a single source file')
  .version('1.0.0');

// Register commands
program.addCommand(initCommand);
program.addCommand(fuseCommand);
program.addCommand(implsCommand);

await program.parseAsync(process.argv);

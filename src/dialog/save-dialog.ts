/**
 * Offers to persist operator decisions after a completed resolution
 */

import fs from 'node:fs';
import path from 'node:path';
import { colors } from '../cli/output.js';
import type { Config } from '../config/schema.js';
import { CONFIG_FILE_NAMES } from '../config/loader.js';
import { applyDecisions, writeConfig } from '../config/writer.js';
import type { RecordedDecision } from '../resolution/config-targets.js';
import type { DialogIO } from './dialog-io.js';
import { completePath } from './fuzzy.js';

export interface SaveDialogOptions {
  decisions: RecordedDecision[];
  config: Config;
  /** Configuration file the run was loaded from */
  configPath: string | null;
  challengeDir: string;
}

export function isInsideDirectory(dir: string, target: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(target));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Returns the written path, or `null` when nothing was saved
 */
export async function runSaveDialog(io: DialogIO, options: SaveDialogOptions): Promise<string | null> {
  if (options.decisions.length === 0) return null;

  const challengeDir = path.resolve(options.challengeDir);
  const save = await io.confirm(`Save ${options.decisions.length} impl decision(s) to a configuration file?`, true);
  if (!save) return null;

  const defaultPath = options.configPath && isInsideDirectory(challengeDir, options.configPath)
    ? path.relative(challengeDir, options.configPath)
    : CONFIG_FILE_NAMES[0] ?? 'crate-fusion.toml';

  for (;;) {
    const answer = await io.text(
      'Configuration file',
      'Path relative to the challenge directory, tab completes',
      defaultPath,
      line => completePath(line, challengeDir)
    );
    if (answer === null) return null;

    const target = path.resolve(challengeDir, answer);
    if (!isInsideDirectory(challengeDir, target)) {
      io.write(`${colors.yellow}The configuration file must be inside ${challengeDir}${colors.reset}`);
      continue;
    }
    if (fs.existsSync(target) && fs.statSync(target).isDirectory()) {
      io.write(`${colors.yellow}${answer} is a directory${colors.reset}`);
      continue;
    }
    if (fs.existsSync(target) && !(await io.confirm(`${answer} exists. Overwrite?`, false))) {
      continue;
    }

    await writeConfig(target, applyDecisions(options.config, options.decisions));
    return target;
  }
}

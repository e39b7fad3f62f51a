/**
 * Fuzzy ranking for dialog candidates and path completion
 */

import fs from 'node:fs';
import path from 'node:path';
import Fuse from 'fuse.js';

export interface RankedCandidate {
  /** Index into the candidate list */
  index: number;
  label: string;
  /** 0 is a perfect match, 1 no match */
  score: number;
}

/**
 * Rank labels against a query, best match first. An empty query keeps the
 * original order.
 */
export function rankCandidates(labels: string[], query: string, limit = 50): RankedCandidate[] {
  const entries = labels.map((label, index) => ({ label, index }));
  if (!query.trim()) {
    return entries.slice(0, limit).map(entry => ({ ...entry, score: 0 }));
  }

  const fuse = new Fuse(entries, {
    keys: ['label'],
    threshold: 0.4,
    includeScore: true,
    ignoreLocation: true,
  });

  return fuse.search(query.trim(), { limit }).map(result => ({
    index: result.item.index,
    label: result.item.label,
    score: result.score ?? 0,
  }));
}

/**
 * Completions for a partially typed path relative to `baseDir`; directories
 * end with a separator
 */
export function completePath(line: string, baseDir: string): string[] {
  const endsWithSeparator = line.endsWith('/') || line.endsWith(path.sep);
  const dirPart = endsWithSeparator ? line : path.dirname(line);
  const partial = endsWithSeparator ? '' : path.basename(line);
  const searchDir = path.resolve(baseDir, dirPart);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(searchDir, { withFileTypes: true });
  } catch {
    return [];
  }

  const labels = entries
    .filter(entry => !entry.name.startsWith('.') || partial.startsWith('.'))
    .map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort();

  const prefix = dirPart === '.' && !line.startsWith('./') ? '' : path.join(dirPart, '/');
  const prefixed = labels.filter(label => label.startsWith(partial));
  const ranked = prefixed.length > 0 ? prefixed : rankCandidates(labels, partial).map(r => r.label);
  return ranked.map(label => `${prefix}${label}`);
}

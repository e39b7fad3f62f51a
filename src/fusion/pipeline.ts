/**
 * Fusion pipeline: load, catalog, graph, resolve, assemble, emit
 */

import fs from 'node:fs';
import path from 'node:path';

import type { ItemId } from '../types/index.js';
import type { Config } from '../config/schema.js';
import { loadCrates, normalizeCrateName, type CrateSource, type LoadedCrate } from '../crates/loader.js';
import { readManifest, resolveChallengeCrates } from '../crates/manifest.js';
import type { RustParser } from '../parsers/rust.js';
import { ItemCatalog } from '../catalog/item-catalog.js';
import { buildDependencyGraph, type DependencyGraph } from '../analysis/dependency-graph.js';
import { resolveImpls, type ResolutionResult } from '../resolution/policy-engine.js';
import type { ResolutionProvider } from '../resolution/providers.js';
import { assembleFusion, type AssembledCrate } from './assembler.js';
import { emitFusion } from './emitter.js';

export interface FuseOptions {
  config: Config;
  provider?: ResolutionProvider;
  entryPoints?: ItemId[];
  parser?: RustParser;
}

export interface FuseResult {
  output: string;
  crates: LoadedCrate[];
  catalog: ItemCatalog;
  graph: DependencyGraph;
  resolution: ResolutionResult;
  assembled: AssembledCrate[];
}

export async function fuseCrates(sources: CrateSource[], options: FuseOptions): Promise<FuseResult> {
  const crates = await loadCrates(sources, options.parser);
  const catalog = ItemCatalog.build(crates.map(loaded => loaded.crate));
  const graph = buildDependencyGraph(catalog);

  const resolution = await resolveImpls(catalog, graph, options.config, {
    entryPoints: options.entryPoints,
    provider: options.provider,
  });

  const assembled = assembleFusion(catalog, resolution.required);
  const output = emitFusion(assembled, {
    libraryCrates: catalog.crates.filter(c => c.kind === 'lib').map(c => c.name),
  });

  return { output, crates, catalog, graph, resolution, assembled };
}

export interface CrateOverrides {
  /** Binary root file (`*.rs`) or binary target name */
  bin?: string;
  /** Library crates as name to root file */
  libs?: Record<string, string>;
}

export interface ChallengeCrates {
  name: string;
  sources: CrateSource[];
}

/**
 * Crates of a challenge from explicit overrides, the `[crates]` section or Cargo.toml
 */
export async function resolveCrateSources(dir: string, config: Config, overrides: CrateOverrides = {}): Promise<ChallengeCrates> {
  const challengeDir = path.resolve(dir);
  const hasManifest = fs.existsSync(path.join(challengeDir, 'Cargo.toml'));
  const binOption = overrides.bin ?? config.crates.bin;
  const binPath = binOption?.endsWith('.rs') ? binOption : undefined;

  const libs = { ...config.crates.libs, ...(overrides.libs ?? {}) };
  const explicitLibs: CrateSource[] = Object.entries(libs).map(([name, rootFile]) => ({
    name,
    kind: 'lib',
    rootFile: path.resolve(challengeDir, rootFile),
  }));

  if (!binPath && hasManifest) {
    const sources = await resolveChallengeCrates(challengeDir, binOption);
    const known = new Set(sources.map(s => `${s.kind}:${normalizeCrateName(s.name)}`));
    const extra = explicitLibs.filter(lib => !known.has(`lib:${normalizeCrateName(lib.name)}`));
    const [bin] = sources;
    return { name: bin?.name ?? path.basename(challengeDir), sources: [...sources, ...extra] };
  }

  if (!binPath) {
    throw new Error(`No Cargo.toml in ${challengeDir}; pass the binary root file with --bin`);
  }

  const name = hasManifest ? (await readManifest(challengeDir)).name : path.basename(challengeDir);
  return {
    name,
    sources: [{ name, kind: 'bin', rootFile: path.resolve(challengeDir, binPath) }, ...explicitLibs],
  };
}

export function defaultOutputPath(challengeDir: string, challengeName: string): string {
  return path.join(path.resolve(challengeDir), 'src', 'bin', `fusion_of_${normalizeCrateName(challengeName)}.rs`);
}

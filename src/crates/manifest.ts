/**
 * Cargo manifest reader: finds the binary root and the local library crates
 * a challenge depends on through `path` dependencies.
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import { z } from 'zod';

import { normalizeCrateName, type CrateSource } from './loader.js';

const dependencySchema = z.union([
  z.string(),
  z.object({
    path: z.string().optional(),
    package: z.string().optional(),
  }).passthrough(),
]);

const targetSchema = z.object({
  name: z.string().optional(),
  path: z.string().optional(),
}).passthrough();

export const cargoManifestSchema = z.object({
  package: z.object({
    name: z.string(),
  }).passthrough(),
  lib: targetSchema.optional(),
  bin: z.array(targetSchema).optional(),
  dependencies: z.record(z.string(), dependencySchema).default({}),
}).passthrough();

export interface PathDependency {
  /** Name the dependency is referenced by in code */
  name: string;
  dir: string;
}

export interface CrateManifest {
  name: string;
  dir: string;
  binRoots: Array<{ name: string; rootFile: string }>;
  libRoot: string | null;
  pathDependencies: PathDependency[];
}

export async function readManifest(dir: string): Promise<CrateManifest> {
  const manifestPath = path.join(path.resolve(dir), 'Cargo.toml');
  if (!fs.existsSync(manifestPath)) {
    throw new Error(`Cargo.toml not found: ${manifestPath}`);
  }

  const content = await fs.promises.readFile(manifestPath, 'utf-8');
  let raw: unknown;
  try {
    raw = TOML.parse(content);
  } catch (error) {
    throw new Error(`Invalid TOML in ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = cargoManifestSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid Cargo manifest ${manifestPath}:\n${errors}`);
  }

  const manifest = result.data;
  const crateDir = path.dirname(manifestPath);

  const binRoots: Array<{ name: string; rootFile: string }> = [];
  for (const bin of manifest.bin ?? []) {
    const name = bin.name ?? manifest.package.name;
    binRoots.push({
      name,
      rootFile: path.join(crateDir, bin.path ?? path.join('src', 'bin', `${name}.rs`)),
    });
  }
  const defaultMain = path.join(crateDir, 'src', 'main.rs');
  if (fs.existsSync(defaultMain) && !binRoots.some(b => b.rootFile === defaultMain)) {
    binRoots.unshift({ name: manifest.package.name, rootFile: defaultMain });
  }

  const libPath = path.join(crateDir, manifest.lib?.path ?? path.join('src', 'lib.rs'));

  const pathDependencies: PathDependency[] = [];
  for (const [name, dependency] of Object.entries(manifest.dependencies)) {
    if (typeof dependency === 'string' || !dependency.path) continue;
    pathDependencies.push({ name, dir: path.resolve(crateDir, dependency.path) });
  }

  return {
    name: manifest.package.name,
    dir: crateDir,
    binRoots,
    libRoot: fs.existsSync(libPath) ? libPath : null,
    pathDependencies,
  };
}

/**
 * Resolve the binary crate and every local library crate it (transitively)
 * depends on, binary first, libraries in first-seen order.
 */
export async function resolveChallengeCrates(dir: string, binName?: string): Promise<CrateSource[]> {
  const challenge = await readManifest(dir);
  const bin = binName
    ? challenge.binRoots.find(b => b.name === binName)
    : challenge.binRoots[0];
  if (!bin) {
    throw new Error(
      binName
        ? `Binary '${binName}' not found in ${challenge.name}`
        : `No binary target found in ${challenge.name}`
    );
  }

  const sources: CrateSource[] = [{ name: challenge.name, kind: 'bin', rootFile: bin.rootFile }];
  const seen = new Set<string>();

  if (challenge.libRoot) {
    sources.push({ name: challenge.name, kind: 'lib', rootFile: challenge.libRoot });
    seen.add(normalizeCrateName(challenge.name));
  }

  const queue = [...challenge.pathDependencies];
  while (queue.length > 0) {
    const dependency = queue.shift();
    if (!dependency) break;
    const crateName = normalizeCrateName(dependency.name);
    if (seen.has(crateName)) continue;
    seen.add(crateName);

    const manifest = await readManifest(dependency.dir);
    if (!manifest.libRoot) {
      throw new Error(`Dependency '${dependency.name}' has no library target`);
    }
    sources.push({ name: dependency.name, kind: 'lib', rootFile: manifest.libRoot });
    queue.push(...manifest.pathDependencies);
  }

  return sources;
}

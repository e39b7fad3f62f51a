/**
 * Unit tests for Cargo manifest reading
 */

import { describe, it, expect, afterEach } from 'vitest';
import { readManifest, resolveChallengeCrates } from '../../../src/crates/manifest.js';
import { createTempProject, type TempProjectResult } from '../../helpers/fixtures.js';

const PACKAGE = (name: string, dependencies = '') =>
  `[package]\nname = "${name}"\nversion = "0.1.0"\nedition = "2021"\n\n[dependencies]\n${dependencies}`;

describe('Cargo manifests', () => {
  let project: TempProjectResult | null = null;

  afterEach(() => {
    project?.cleanup();
    project = null;
  });

  it('reads the default binary and path dependencies', async () => {
    project = createTempProject({
      'challenge/Cargo.toml': PACKAGE('challenge', 'my-lib = { path = "../my-lib" }\nrand = "0.8"\n'),
      'challenge/src/main.rs': 'fn main() {}\n',
    });

    const manifest = await readManifest(project.getFilePath('challenge'));

    expect(manifest.name).toBe('challenge');
    expect(manifest.binRoots).toEqual([{ name: 'challenge', rootFile: project.getFilePath('challenge/src/main.rs') }]);
    expect(manifest.libRoot).toBeNull();
    expect(manifest.pathDependencies).toEqual([{ name: 'my-lib', dir: project.getFilePath('my-lib') }]);
  });

  it('reads explicit bin targets', async () => {
    project = createTempProject({
      'Cargo.toml': `${PACKAGE('puzzles')}\n[[bin]]\nname = "day01"\npath = "src/day01.rs"\n\n[[bin]]\nname = "day02"\n`,
    });

    const manifest = await readManifest(project.rootDir);

    expect(manifest.binRoots).toEqual([
      { name: 'day01', rootFile: project.getFilePath('src/day01.rs') },
      { name: 'day02', rootFile: project.getFilePath('src/bin/day02.rs') },
    ]);
  });

  it('rejects a manifest without a package name', async () => {
    project = createTempProject({ 'Cargo.toml': '[package]\nversion = "0.1.0"\n' });

    await expect(readManifest(project.rootDir)).rejects.toThrow('package.name');
  });

  it('resolves transitive library crates once, in first-seen order', async () => {
    project = createTempProject({
      'challenge/Cargo.toml': PACKAGE('challenge', 'grid = { path = "../grid" }\nmy-lib = { path = "../my-lib" }\n'),
      'challenge/src/main.rs': 'fn main() {}\n',
      'grid/Cargo.toml': PACKAGE('grid', 'my-lib = { path = "../my-lib" }\n'),
      'grid/src/lib.rs': '',
      'my-lib/Cargo.toml': PACKAGE('my-lib'),
      'my-lib/src/lib.rs': '',
    });

    const sources = await resolveChallengeCrates(project.getFilePath('challenge'));

    expect(sources).toEqual([
      { name: 'challenge', kind: 'bin', rootFile: project.getFilePath('challenge/src/main.rs') },
      { name: 'grid', kind: 'lib', rootFile: project.getFilePath('grid/src/lib.rs') },
      { name: 'my-lib', kind: 'lib', rootFile: project.getFilePath('my-lib/src/lib.rs') },
    ]);
  });

  it('selects a binary target by name', async () => {
    project = createTempProject({
      'Cargo.toml': `${PACKAGE('puzzles')}\n[[bin]]\nname = "day01"\npath = "src/day01.rs"\n\n[[bin]]\nname = "day02"\npath = "src/day02.rs"\n`,
    });

    const sources = await resolveChallengeCrates(project.rootDir, 'day02');

    expect(sources[0]).toEqual({ name: 'puzzles', kind: 'bin', rootFile: project.getFilePath('src/day02.rs') });
    await expect(resolveChallengeCrates(project.rootDir, 'day03')).rejects.toThrow("Binary 'day03' not found in puzzles");
  });

  it('fails for a path dependency without a library target', async () => {
    project = createTempProject({
      'challenge/Cargo.toml': PACKAGE('challenge', 'tool = { path = "../tool" }\n'),
      'challenge/src/main.rs': 'fn main() {}\n',
      'tool/Cargo.toml': PACKAGE('tool'),
    });

    await expect(resolveChallengeCrates(project.getFilePath('challenge'))).rejects.toThrow("Dependency 'tool' has no library target");
  });
});

/**
 * Unit tests for the fusion emitter
 */

import { describe, it, expect } from 'vitest';
import { emitFusion, reindent } from '../../../src/fusion/emitter.js';
import { assembleFusion } from '../../../src/fusion/assembler.js';
import { buildDependencyGraph } from '../../../src/analysis/dependency-graph.js';
import { resolveImpls } from '../../../src/resolution/policy-engine.js';
import type { ItemId } from '../../../src/types/index.js';
import { catalogOf, configWith, type CrateSnippet } from '../../helpers/rust.js';

async function fuse(...snippets: CrateSnippet[]): Promise<string> {
  const catalog = await catalogOf(...snippets);
  const resolution = await resolveImpls(catalog, buildDependencyGraph(catalog), configWith());
  return emitFusion(assembleFusion(catalog, resolution.required), {
    libraryCrates: catalog.crates.filter(c => c.kind === 'lib').map(c => c.name),
  });
}

async function emitRequired(snippet: CrateSnippet, required: ItemId[]): Promise<string> {
  const catalog = await catalogOf(snippet);
  return emitFusion(assembleFusion(catalog, new Set(required)), { libraryCrates: [] });
}

describe('emitFusion', () => {
  it('inlines libraries as modules and rewrites crate paths', async () => {
    const output = await fuse(
      { source: 'fn main() {\n    util::run();\n}\n' },
      {
        name: 'util',
        kind: 'lib',
        source: 'pub fn run() {\n    crate::inner::go();\n}\n\npub mod inner {\n    pub fn go() {}\n}\n',
      }
    );

    expect(output).toBe(
      'fn main() {\n    crate::util::run();\n}\n\n' +
        'pub mod util {\n    pub fn run() {\n        crate::util::inner::go();\n    }\n\n' +
        '    pub mod inner {\n        pub fn go() {}\n    }\n}\n'
    );
  });

  it('rewrites use paths into libraries and reindents nested items', async () => {
    const output = await fuse(
      { source: 'use util::grid::Grid;\n\nfn main() {\n    let g = Grid::new();\n}\n' },
      {
        name: 'util',
        kind: 'lib',
        source: 'pub mod grid {\n    pub struct Grid;\n\n    impl Grid {\n        pub fn new() -> Self {\n            Grid\n        }\n    }\n}\n',
      }
    );

    expect(output).toBe(
      'use crate::util::grid::Grid;\n\nfn main() {\n    let g = Grid::new();\n}\n\n' +
        'pub mod util {\n    pub mod grid {\n        pub struct Grid;\n\n' +
        '        impl Grid {\n            pub fn new() -> Self {\n                Grid\n            }\n        }\n    }\n}\n'
    );
  });

  it('keeps the library re-export a use path goes through', async () => {
    const output = await fuse(
      { source: 'use util::Point;\n\nfn main() {\n    let p = Point { x: 1 };\n}\n' },
      {
        name: 'util',
        kind: 'lib',
        source: 'pub mod geometry {\n    pub struct Point {\n        pub x: u32,\n    }\n}\n\npub use geometry::Point;\n',
      }
    );

    expect(output).toBe(
      'use crate::util::Point;\n\nfn main() {\n    let p = Point { x: 1 };\n}\n\n' +
        'pub mod util {\n    pub mod geometry {\n        pub struct Point {\n            pub x: u32,\n        }\n    }\n\n' +
        '    pub use geometry::Point;\n}\n'
    );
  });

  it('drops glob imports of external crates', async () => {
    const output = await fuse(
      { source: 'fn main() {\n    util::make();\n}\n' },
      { name: 'util', kind: 'lib', source: 'use rand::prelude::*;\n\npub fn make() -> Vec<u32> {\n    Vec::new()\n}\n' }
    );

    expect(output).toBe(
      'fn main() {\n    crate::util::make();\n}\n\n' +
        'pub mod util {\n    pub fn make() -> Vec<u32> {\n        Vec::new()\n    }\n}\n'
    );
  });

  it('keeps inner and outer attributes', async () => {
    const output = await fuse({
      source: '#![allow(dead_code)]\n\n#[derive(Debug)]\nstruct Unit;\n\nfn main() {\n    println!("{:?}", Unit);\n}\n',
    });

    expect(output).toBe(
      '#![allow(dead_code)]\n\n#[derive(Debug)]\nstruct Unit;\n\nfn main() {\n    println!("{:?}", Unit);\n}\n'
    );
  });

  it('renders a module without required children as empty', async () => {
    const output = await emitRequired(
      { source: 'mod geometry {\n    pub fn area() {}\n}\n\nfn main() {}\n' },
      ['crate#mod:geometry', 'crate#fn:main']
    );

    expect(output).toBe('mod geometry {}\n\nfn main() {}\n');
  });

  it('renders an impl block without required items as empty', async () => {
    const output = await emitRequired(
      { source: 'struct P;\n\nimpl P {\n    fn a() {}\n}\n\nfn main() {}\n' },
      ['crate#struct:P', 'crate#impl:impl P', 'crate#fn:main']
    );

    expect(output).toBe('struct P;\n\nimpl P {}\n\nfn main() {}\n');
  });

  it('keeps multi-line impl headers and opens the body on the last header line', async () => {
    const source = 'struct W<T>(T);\n\nimpl<T> W<T>\nwhere\n    T: Copy,\n{\n    fn get(&self) -> T {\n        self.0\n    }\n}\n\nfn main() {}\n';
    const output = await emitRequired({ source }, [
      'crate#struct:W',
      'crate#impl:impl<T> W<T> whereT:Copy,',
      'crate#impl:impl<T> W<T> whereT:Copy,/fn:get',
      'crate#fn:main',
    ]);

    expect(output).toBe(
      'struct W<T>(T);\n\nimpl<T> W<T>\nwhere\n    T: Copy, {\n    fn get(&self) -> T {\n        self.0\n    }\n}\n\nfn main() {}\n'
    );
  });
});

describe('reindent', () => {
  it('moves continuation lines relative to the first line', () => {
    expect(reindent('fn a() {\n        body();\n    }', 4, 1)).toEqual(['    fn a() {', '        body();', '    }']);
  });

  it('keeps blank lines empty', () => {
    expect(reindent('fn a() {\n\n    b();\n}', 0, 2)).toEqual(['        fn a() {', '', '            b();', '        }']);
  });
});

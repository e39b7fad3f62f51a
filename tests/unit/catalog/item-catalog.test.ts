/**
 * Unit tests for the item catalog
 */

import { describe, it, expect } from 'vitest';
import { importedName, itemIdentity } from '../../../src/catalog/item-catalog.js';
import { DuplicateItemIdentityError, UnsupportedItemKindError } from '../../../src/errors.js';
import { catalogOf } from '../../helpers/rust.js';

const CHALLENGE = `#![allow(dead_code)]
use std::collections::HashMap;
use std::io::{Read, Write as W};

const LIMIT: usize = 10;

#[derive(Debug)]
pub struct Point {
    x: i64,
}

impl Point {
    pub fn new(x: i64) -> Self {
        Point { x }
    }

    const ORIGIN: i64 = 0;
}

mod geometry {
    pub fn area() -> i64 {
        0
    }
}

#[cfg(test)]
mod tests {
    fn check() {}
}

fn main() {}
`;

describe('ItemCatalog', () => {
  it('records items in declaration order with stable identities', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });

    expect(catalog.all().map(item => item.id)).toEqual([
      'crate#use:HashMap',
      'crate#use:Read,W',
      'crate#const:LIMIT',
      'crate#struct:Point',
      'crate#impl:impl Point',
      'crate#impl:impl Point/fn:new',
      'crate#impl:impl Point/const:ORIGIN',
      'crate#mod:geometry',
      'crate::geometry#fn:area',
      'crate#fn:main',
    ]);
  });

  it('keeps attributes, visibility and locations', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });

    const point = catalog.require('crate#struct:Point');
    expect(point.attributes).toEqual(['#[derive(Debug)]']);
    expect(point.visibility).toBe('pub');
    expect(point.location).toEqual({ filePath: '/virtual/challenge/src/main.rs', line: 8, column: 1, endLine: 10 });
    expect(catalog.crates[0]?.innerAttributes).toEqual(['#![allow(dead_code)]']);
  });

  it('links impl items to their block', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });

    const [block] = catalog.implBlocks();
    expect(block?.qualifiedName).toBe('impl Point');
    expect(block?.selfTypeName).toBe('Point');
    expect(block?.children).toEqual(['crate#impl:impl Point/fn:new', 'crate#impl:impl Point/const:ORIGIN']);

    const [item] = catalog.implItemsNamed('new');
    expect(item?.itemKind).toBe('fn');
    expect(item && catalog.blockOf(item).id).toBe('crate#impl:impl Point');
  });

  it('flattens use trees into imports', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });

    const uses = catalog.usesIn('crate', []);
    expect(uses.map(u => u.imports)).toEqual([
      [{ path: ['std', 'collections', 'HashMap'], alias: null, glob: false }],
      [
        { path: ['std', 'io', 'Read'], alias: null, glob: false },
        { path: ['std', 'io', 'Write'], alias: 'W', glob: false },
      ],
    ]);
    expect(uses[1]?.imports.map(importedName)).toEqual(['Read', 'W']);
  });

  it('catalogs module files and library crates under their crate prefix', async () => {
    const catalog = await catalogOf(
      { source: 'mod input;\nfn main() {}\n', modules: { input: 'pub fn read() {}\n' } },
      { name: 'util', kind: 'lib', source: 'pub mod grid {\n    pub struct Grid;\n}\n\npub fn help() {}\n' }
    );

    expect(catalog.has('crate::input#fn:read')).toBe(true);
    expect(catalog.require('crate::input#fn:read').location.filePath).toBe('/virtual/challenge/src/input.rs');
    expect(catalog.has('util::grid#struct:Grid')).toBe(true);
    expect(catalog.has('util#fn:help')).toBe(true);
    expect(catalog.crates.map(c => c.idPrefix)).toEqual(['crate', 'util']);
  });

  it('numbers repeated impl blocks of the same name', async () => {
    const catalog = await catalogOf({
      source: 'struct P;\nimpl P {\n    fn a() {}\n}\nimpl P {\n    fn b() {}\n}\nfn main() {}\n',
    });

    expect(catalog.implBlocks().map(b => b.id)).toEqual(['crate#impl:impl P', 'crate#impl:impl P#2']);
    expect(catalog.has('crate#impl:impl P#2/fn:b')).toBe(true);
  });

  it('derives canonical names for generic trait impls', async () => {
    const catalog = await catalogOf({
      source: `use std::fmt;
struct Wrapper<'a, T>(&'a T);
impl<'a, T: Clone> fmt::Display for Wrapper<'a, T>
where
    T: fmt::Debug
{
    fn fmt(&self, f: &mut fmt::Formatter) -> fmt::Result {
        Ok(())
    }
}
fn main() {}
`,
    });

    const [block] = catalog.implBlocks();
    expect(block?.qualifiedName).toBe("impl<'a,T:Clone> fmt::Display for Wrapper<'a,T> whereT:fmt::Debug");
    expect(block?.selfTypeName).toBe('Wrapper');
    expect(block?.parsedName.traitPath).toBe('fmt::Display');
  });

  it('drops extern crate declarations of fused libraries', async () => {
    const catalog = await catalogOf(
      { source: 'extern crate util;\nextern crate rand;\nfn main() {}\n' },
      { name: 'util', kind: 'lib', source: 'pub fn help() {}\n' }
    );

    const uses = catalog.all().filter(item => item.kind === 'use');
    expect(uses.map(u => u.id)).toEqual(['crate#use:rand']);
  });

  it('rejects unsupported items', async () => {
    const error = await catalogOf({ source: 'macro_rules! twice {\n    ($e:expr) => { $e * 2 };\n}\nfn main() {}\n' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedItemKindError);
    expect(error instanceof Error ? error.message : '').toBe(
      "Unsupported item kind 'macro_definition' at /virtual/challenge/src/main.rs:1:1"
    );
  });

  it('rejects duplicate identities', async () => {
    const error = await catalogOf({ source: 'fn main() {}\nfn main() {}\n' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DuplicateItemIdentityError);
    expect(error instanceof DuplicateItemIdentityError ? error.identity : '').toBe('crate#fn:main');
  });

  it('looks up free items by name', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });

    expect(catalog.freeItemsNamed('area').map(i => i.id)).toEqual(['crate::geometry#fn:area']);
    expect(catalog.freeItemsNamed('geometry').map(i => i.kind)).toEqual(['mod']);
    expect(catalog.freeItemsNamed('check')).toEqual([]);
  });

  it('returns the enclosing block of impl items only', async () => {
    const catalog = await catalogOf({ source: CHALLENGE });
    const block = catalog.require('crate#impl:impl Point');

    expect(catalog.enclosingBlock(catalog.require('crate#impl:impl Point/fn:new'))).toBe(block);
    expect(catalog.enclosingBlock(catalog.require('crate#fn:main'))).toBeNull();
  });
});

describe('itemIdentity', () => {
  it('joins the crate prefix and module path', () => {
    expect(itemIdentity('crate', [], 'fn', 'main')).toBe('crate#fn:main');
    expect(itemIdentity('util', ['grid', 'cell'], 'struct', 'Cell')).toBe('util::grid::cell#struct:Cell');
  });
});

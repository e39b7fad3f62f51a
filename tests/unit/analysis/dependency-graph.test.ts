/**
 * Unit tests for the dependency graph
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '../../../src/analysis/dependency-graph.js';
import { analyze } from '../../helpers/rust.js';

const DISPLAY = `use std::fmt;

struct Go;
struct Value(u32);

impl fmt::Display for Go {
    fn fmt(&self, f: &mut fmt::Formatter) -> fmt::Result {
        write!(f, "go")
    }
}

impl fmt::Display for Value {
    fn fmt(&self, f: &mut fmt::Formatter) -> fmt::Result {
        write!(f, "{}", self.0)
    }
}

fn main() {
    let v = Value(3);
    println!("{}", v);
}
`;

const ITERATOR = `struct A;
struct B;

impl A {
    fn next(&self) -> u32 {
        1
    }
}

impl Iterator for B {
    type Item = u32;
    fn next(&mut self) -> Option<u32> {
        None
    }
}

fn main() {
    let a = A;
    a.next();
}
`;

function targets(graph: DependencyGraph, id: string): string[] {
  return graph.edgesFrom(id).map(edge => `${edge.kind} ${edge.to}`);
}

describe('buildDependencyGraph', () => {
  it('links free references to items in the same module', async () => {
    const { graph } = await analyze({ source: DISPLAY });

    expect(targets(graph, 'crate#fn:main')).toEqual(['reference crate#struct:Value']);
  });

  it('adds owner, atomic and header edges for trait impls', async () => {
    const { graph } = await analyze({ source: DISPLAY });
    const block = 'crate#impl:impl fmt::Display for Value';

    expect(targets(graph, block)).toEqual([
      `atomic ${block}/fn:fmt`,
      'reference crate#use:fmt',
      'reference crate#struct:Value',
    ]);
    expect(targets(graph, `${block}/fn:fmt`)).toEqual([`owner ${block}`, 'reference crate#use:fmt']);
  });

  it('records method calls with several candidates as ambiguous', async () => {
    const { graph } = await analyze({ source: ITERATOR });

    const ambiguous = graph.ambiguousFrom('crate#fn:main');
    expect(ambiguous).toHaveLength(1);
    expect(ambiguous[0]?.name).toBe('next');
    expect(ambiguous[0]?.qualifier).toBeNull();
    expect(ambiguous[0]?.candidates).toEqual(['crate#impl:impl A/fn:next', 'crate#impl:impl Iterator for B/fn:next']);
    expect(targets(graph, 'crate#fn:main')).toEqual(['reference crate#struct:A']);
  });

  it('resolves a single impl item candidate directly', async () => {
    const { graph } = await analyze({
      source: 'struct Foo;\nimpl Foo {\n    fn new() -> Self {\n        Foo\n    }\n}\nfn main() {\n    Foo::new();\n}\n',
    });

    expect(targets(graph, 'crate#fn:main')).toEqual([
      'reference crate#struct:Foo',
      'reference crate#impl:impl Foo/fn:new',
    ]);
  });

  it('keeps the qualifier of ambiguous Type::name paths', async () => {
    const { graph } = await analyze({
      source: 'struct Foo;\nstruct Bar;\nimpl Foo {\n    fn new() {}\n}\nimpl Bar {\n    fn new() {}\n}\nfn main() {\n    Foo::new();\n}\n',
    });

    const [edge] = graph.ambiguousFrom('crate#fn:main');
    expect(edge?.qualifier).toBe('Foo');
    expect(edge?.candidates).toEqual(['crate#impl:impl Foo/fn:new', 'crate#impl:impl Bar/fn:new']);
  });

  it('does not look up impl items behind module paths', async () => {
    const { graph } = await analyze({
      source: 'mod geometry {\n    pub fn area() {}\n}\nstruct S;\nimpl S {\n    fn area(&self) {}\n}\nfn main() {\n    geometry::area();\n}\n',
    });

    expect(targets(graph, 'crate#fn:main')).toEqual([
      'reference crate#mod:geometry',
      'reference crate::geometry#fn:area',
    ]);
    expect(graph.ambiguousFrom('crate#fn:main')).toEqual([]);
  });

  it('routes names through use declarations to library items', async () => {
    const { graph } = await analyze(
      { source: 'use util::grid::Grid;\n\nfn main() {\n    Grid::default();\n}\n' },
      { name: 'util', kind: 'lib', source: 'pub mod grid {\n    pub struct Grid;\n}\n' }
    );

    expect(targets(graph, 'crate#fn:main')).toEqual(['reference crate#use:Grid']);
    expect(targets(graph, 'crate#use:Grid')).toEqual(['import util::grid#struct:Grid']);
    expect(targets(graph, 'util::grid#struct:Grid')).toEqual(['parent util#mod:grid']);
  });

  it('routes imports through re-exports of a library', async () => {
    const { graph } = await analyze(
      { source: 'use util::Point;\n\nfn main() {\n    let p = Point { x: 1 };\n}\n' },
      {
        name: 'util',
        kind: 'lib',
        source: 'pub mod geometry {\n    pub struct Point {\n        pub x: u32,\n    }\n}\n\npub use geometry::Point;\n',
      }
    );

    expect(targets(graph, 'crate#use:Point')).toEqual(['import util#use:Point']);
    expect(targets(graph, 'util#use:Point')).toEqual(['import util::geometry#struct:Point']);
  });

  it('links glob imports of fused modules that provide the name', async () => {
    const { graph } = await analyze(
      { source: 'use util::shapes::*;\n\nfn main() {\n    area();\n}\n' },
      { name: 'util', kind: 'lib', source: 'pub mod shapes {\n    pub fn area() {}\n}\n' }
    );

    expect(targets(graph, 'crate#fn:main')).toEqual(['reference crate#use:*', 'reference util::shapes#fn:area']);
    expect(targets(graph, 'crate#use:*')).toEqual(['import util#mod:shapes']);
  });

  it('leaves glob imports of external crates unlinked', async () => {
    const { graph } = await analyze({
      source: 'use rand::prelude::*;\n\nfn make() -> Vec<u32> {\n    Vec::new()\n}\n\nfn main() {\n    make();\n}\n',
    });

    expect(targets(graph, 'crate#fn:make')).toEqual([]);
    expect(graph.referrersOf('crate#use:*')).toEqual([]);
  });

  it('lists referrers through plain and ambiguous edges', async () => {
    const { graph } = await analyze({ source: ITERATOR });

    expect(graph.referrersOf('crate#impl:impl A/fn:next').map(r => r.from)).toEqual(['crate#fn:main']);
    expect(graph.referrersOf('crate#struct:A').map(r => r.from)).toEqual(['crate#impl:impl A', 'crate#fn:main']);
  });
});

describe('DependencyGraph', () => {
  it('ignores self edges and repeated edges', () => {
    const graph = new DependencyGraph(['a', 'b']);

    expect(graph.addEdge('a', 'a', 'reference')).toBe(false);
    expect(graph.addEdge('a', 'b', 'reference')).toBe(true);
    expect(graph.addEdge('a', 'b', 'import')).toBe(false);
    expect(graph.edgeCount).toBe(1);
    expect(graph.edgesTo('b').map(e => e.from)).toEqual(['a']);
  });
});

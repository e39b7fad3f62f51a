/**
 * Unit tests for impl item configuration patterns
 */

import { describe, it, expect } from 'vitest';
import {
  formatImplItemPattern,
  parseImplBlockPattern,
  parseImplItemPattern,
} from '../../../src/resolution/patterns.js';
import { InvalidConfigPatternError } from '../../../src/errors.js';

describe('parseImplItemPattern', () => {
  it('parses a plain item name', () => {
    expect(parseImplItemPattern('next')).toEqual({ kind: 'plain', name: 'next', raw: 'next' });
  });

  it('parses a qualified item and canonicalizes the block', () => {
    expect(parseImplItemPattern('next@impl  Iterator for Counter')).toEqual({
      kind: 'qualified',
      name: 'next',
      block: 'impl Iterator for Counter',
      raw: 'next@impl  Iterator for Counter',
    });
  });

  it('parses a wildcard with a block', () => {
    expect(parseImplItemPattern('*@ impl Foo')).toEqual({ kind: 'wildcard', block: 'impl Foo', raw: '*@ impl Foo' });
  });

  it('accepts raw identifiers', () => {
    expect(parseImplItemPattern('r#type')).toEqual({ kind: 'plain', name: 'r#type', raw: 'r#type' });
  });

  it('rejects a wildcard without a block', () => {
    expect(() => parseImplItemPattern('*')).toThrow(InvalidConfigPatternError);
    expect(() => parseImplItemPattern('*')).toThrow("wildcard '*' requires a fully qualified impl block name");
  });

  it('rejects names that are not identifiers', () => {
    expect(() => parseImplItemPattern('fo o')).toThrow("'fo o' is not an impl item name");
  });

  it('rejects an empty block after @', () => {
    expect(() => parseImplItemPattern('next@')).toThrow("missing impl block name after '@'");
  });

  it('rejects a malformed block name', () => {
    expect(() => parseImplItemPattern('next@Iterator for Counter')).toThrow("expected 'impl'");
  });
});

describe('parseImplBlockPattern', () => {
  it('returns the canonical block name', () => {
    expect(parseImplBlockPattern('impl fmt::Display  for Value')).toBe('impl fmt::Display for Value');
  });
});

describe('formatImplItemPattern', () => {
  it('formats each pattern kind', () => {
    expect(formatImplItemPattern({ kind: 'plain', name: 'new', raw: 'new' })).toBe('new');
    expect(formatImplItemPattern({ kind: 'qualified', name: 'new', block: 'impl Foo', raw: '' })).toBe('new@impl Foo');
    expect(formatImplItemPattern({ kind: 'wildcard', block: 'impl Foo', raw: '' })).toBe('*@impl Foo');
  });
});

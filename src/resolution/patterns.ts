/**
 * Impl item and impl block configuration patterns
 *
 *   name                      plain impl item name
 *   name@<block name>         item of a specific impl block
 *   *@<block name>            every item of an impl block
 */

import { InvalidConfigPatternError } from '../errors.js';
import { canonicalBlockName } from '../catalog/qualified-name.js';

export type ImplItemPattern =
  | { kind: 'plain'; name: string; raw: string }
  | { kind: 'qualified'; name: string; block: string; raw: string }
  | { kind: 'wildcard'; block: string; raw: string };

const ITEM_NAME = /^(?:r#)?[A-Za-z_][A-Za-z0-9_]*$/;

export function parseImplItemPattern(raw: string): ImplItemPattern {
  const separator = raw.indexOf('@');
  const name = (separator === -1 ? raw : raw.slice(0, separator)).trim();
  const block = separator === -1 ? null : raw.slice(separator + 1).trim();

  if (name === '*') {
    if (!block) {
      throw new InvalidConfigPatternError(raw, "wildcard '*' requires a fully qualified impl block name ('*@impl ...')");
    }
    return { kind: 'wildcard', block: canonicalBlockName(block), raw };
  }

  if (!ITEM_NAME.test(name)) {
    throw new InvalidConfigPatternError(raw, `'${name}' is not an impl item name`);
  }

  if (block === null) {
    return { kind: 'plain', name, raw };
  }
  if (!block) {
    throw new InvalidConfigPatternError(raw, "missing impl block name after '@'");
  }
  return { kind: 'qualified', name, block: canonicalBlockName(block), raw };
}

export function parseImplBlockPattern(raw: string): string {
  return canonicalBlockName(raw);
}

export function formatImplItemPattern(pattern: ImplItemPattern): string {
  switch (pattern.kind) {
    case 'plain':
      return pattern.name;
    case 'qualified':
      return `${pattern.name}@${pattern.block}`;
    case 'wildcard':
      return `*@${pattern.block}`;
  }
}

/**
 * Fully qualified impl block names.
 *
 * Canonical form: `impl<generics> [trait_path for] type_path [where<predicates>]`,
 * components joined by single spaces, whitespace removed inside each component.
 * Examples:
 *   impl<constX:usize,constY:usize> map::TwoDim<X,Y>
 *   impl<'a> From<&'astr> for FooType<'a>
 *   impl<D> MyPrint for MyType<D> whereD:Display
 */

import type { QualifiedBlockName, SyntaxNode } from '../types/index.js';
import { InvalidConfigPatternError } from '../errors.js';
import { compactText } from '../parsers/syntax-utils.js';

interface Token {
  text: string;
  kind: 'ident' | 'lifetime' | 'literal' | 'punct';
  spaceBefore: boolean;
}

const OPENING = new Set(['<', '(', '[']);
const CLOSING = new Set(['>', ')', ']']);

function isIdentChar(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let spaceBefore = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i] ?? '';

    if (/\s/.test(char)) {
      spaceBefore = true;
      i++;
      continue;
    }

    let end = i + 1;
    let kind: Token['kind'] = 'punct';

    if (isIdentChar(char)) {
      while (end < text.length && isIdentChar(text[end] ?? '')) end++;
      kind = 'ident';
    } else if (char === "'") {
      while (end < text.length && isIdentChar(text[end] ?? '')) end++;
      if (text[end] === "'") {
        // char literal in a const generic argument
        end++;
        kind = 'literal';
      } else {
        kind = 'lifetime';
      }
    } else if (char === '"') {
      while (end < text.length && text[end] !== '"') {
        end += text[end] === '\\' ? 2 : 1;
      }
      end = Math.min(end + 1, text.length);
      kind = 'literal';
    } else if ((char === ':' && text[i + 1] === ':') || (char === '-' && text[i + 1] === '>')) {
      end = i + 2;
    }

    tokens.push({ text: text.slice(i, end), kind, spaceBefore });
    spaceBefore = false;
    i = end;
  }

  return tokens;
}

class QualifiedNameParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private tokens: Token[]
  ) {}

  parse(): QualifiedBlockName {
    if (this.peek()?.text === 'unsafe') this.pos++;
    if (this.next()?.text !== 'impl') {
      this.fail("expected 'impl'");
    }

    let generics: string | null = null;
    if (this.peek()?.text === '<') {
      generics = this.balanced();
    }

    const first = this.path();
    let traitPath: string | null = null;
    let typePath = first.text;
    let stop = first.stop;

    if (stop === 'for') {
      traitPath = first.text;
      const second = this.path();
      typePath = second.text;
      stop = second.stop;
    }

    if (!typePath) {
      this.fail('missing type path');
    }

    let whereClause: string | null = null;
    if (stop === 'where') {
      whereClause = this.rest();
      if (!whereClause) {
        this.fail('empty where clause');
      }
    }

    return { generics, traitPath, typePath, whereClause };
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  private balanced(): string {
    let depth = 0;
    let text = '';
    while (this.pos < this.tokens.length) {
      const token = this.next();
      if (!token) break;
      text += token.text;
      if (OPENING.has(token.text)) depth++;
      if (CLOSING.has(token.text)) depth--;
      if (depth === 0) return text;
    }
    this.fail('unbalanced generic parameter list');
  }

  /**
   * Reads a trait or type path up to a top-level `for`, `where` or the end
   */
  private path(): { text: string; stop: 'for' | 'where' | 'end' } {
    let depth = 0;
    let text = '';

    while (this.pos < this.tokens.length) {
      const token = this.peek();
      if (!token) break;

      if (depth === 0 && text && token.kind === 'ident') {
        if (token.text === 'for' && text && this.tokens[this.pos + 1]?.text !== '<') {
          this.pos++;
          return { text, stop: 'for' };
        }
        if (token.text === 'where') {
          this.pos++;
          return { text, stop: 'where' };
        }
        // canonical form glues the where keyword to its first predicate
        if (token.spaceBefore && token.text.startsWith('where')) {
          this.tokens = [
            ...this.tokens.slice(0, this.pos),
            { text: token.text.slice('where'.length), kind: 'ident', spaceBefore: false },
            ...this.tokens.slice(this.pos + 1),
          ];
          return { text, stop: 'where' };
        }
      }

      if (OPENING.has(token.text)) depth++;
      if (CLOSING.has(token.text)) depth--;
      if (depth < 0) this.fail(`unexpected '${token.text}'`);
      text += token.text;
      this.pos++;
    }

    if (depth !== 0) this.fail('unbalanced brackets');
    return { text, stop: 'end' };
  }

  private rest(): string {
    const text = this.tokens.slice(this.pos).map(t => t.text).join('');
    this.pos = this.tokens.length;
    return text;
  }

  private fail(reason: string): never {
    throw new InvalidConfigPatternError(this.source, `invalid impl block name, ${reason}`);
  }
}

/**
 * Parse a fully qualified impl block name written with arbitrary whitespace
 */
export function parseQualifiedBlockName(text: string): QualifiedBlockName {
  return new QualifiedNameParser(text, tokenize(text)).parse();
}

export function formatQualifiedBlockName(name: QualifiedBlockName): string {
  const parts = [`impl${name.generics ?? ''}`];
  if (name.traitPath) parts.push(`${name.traitPath} for`);
  parts.push(name.typePath);
  if (name.whereClause) parts.push(`where${name.whereClause}`);
  return parts.join(' ');
}

export function canonicalBlockName(text: string): string {
  return formatQualifiedBlockName(parseQualifiedBlockName(text));
}

/**
 * Derive the qualified name of an `impl_item` syntax node
 */
export function qualifiedNameFromNode(node: SyntaxNode): QualifiedBlockName {
  const generics = node.childForFieldName('type_parameters');
  const traitNode = node.childForFieldName('trait');
  const typeNode = node.childForFieldName('type');
  const whereNode = node.namedChildren.find(c => c.type === 'where_clause');

  return {
    generics: generics ? compactText(generics.text) : null,
    traitPath: traitNode ? compactText(traitNode.text) : null,
    typePath: typeNode ? compactText(typeNode.text) : '',
    whereClause: whereNode ? compactText(whereNode.text).replace(/^where/, '') : null,
  };
}

/**
 * Last path segment of a type node without generic arguments,
 * e.g. `&'a mut map::TwoDim<X, Y>` gives `TwoDim`
 */
export function typeNameFromNode(node: SyntaxNode): string {
  switch (node.type) {
    case 'type_identifier':
    case 'primitive_type':
      return node.text;
    case 'generic_type': {
      const inner = node.childForFieldName('type');
      return inner ? typeNameFromNode(inner) : compactText(node.text);
    }
    case 'scoped_type_identifier': {
      const name = node.childForFieldName('name');
      return name ? name.text : compactText(node.text);
    }
    case 'reference_type':
    case 'pointer_type':
    case 'array_type': {
      const inner = node.childForFieldName('type') ?? node.childForFieldName('element');
      return inner ? typeNameFromNode(inner) : compactText(node.text);
    }
    default:
      return compactText(node.text);
  }
}

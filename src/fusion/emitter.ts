/**
 * Renders assembled items as a single source file
 */

import type { Item, SyntaxNode } from '../types/index.js';
import { walk } from '../parsers/syntax-utils.js';
import { referenceRoots } from '../analysis/reference-extractor.js';
import type { AssembledCrate, AssembledItem } from './assembler.js';

const INDENT = '    ';

const SCOPED_PARENTS = new Set(['scoped_identifier', 'scoped_type_identifier', 'scoped_use_list']);

interface TextEdit {
  start: number;
  end: number;
  text: string;
}

export interface EmitOptions {
  /** Names of the library crates inlined as modules */
  libraryCrates: string[];
}

function isPathRoot(node: SyntaxNode): boolean {
  const parent = node.parent;
  if (!parent) return false;
  if (parent.type === 'use_wildcard') return true;
  if (!SCOPED_PARENTS.has(parent.type)) return false;
  const pathNode = parent.childForFieldName('path');
  return pathNode !== null && pathNode.startIndex === node.startIndex && pathNode.endIndex === node.endIndex;
}

/**
 * Paths that change meaning once library crates become modules of one file:
 * `crate::x` inside library `lib` becomes `crate::lib::x`, `lib::x` becomes `crate::lib::x`
 */
export function pathRewrites(item: Item, roots: SyntaxNode[], libraryCrates: ReadonlySet<string>): TextEdit[] {
  const edits: TextEdit[] = [];
  for (const root of roots) {
    walk(root, node => {
      if (node.type === 'token_tree') return false;
      if (!isPathRoot(node)) return;

      if (node.type === 'crate' && item.crateKind === 'lib') {
        edits.push({ start: node.startIndex, end: node.endIndex, text: `crate::${item.crate}` });
      } else if (node.type === 'identifier' && libraryCrates.has(node.text)) {
        edits.push({ start: node.startIndex, end: node.endIndex, text: `crate::${node.text}` });
      }
    });
  }
  return edits.sort((a, b) => a.start - b.start);
}

function sliceWithEdits(content: string, start: number, end: number, edits: TextEdit[]): string {
  let text = '';
  let position = start;
  for (const edit of edits) {
    if (edit.start < position || edit.end > end) continue;
    text += content.slice(position, edit.start) + edit.text;
    position = edit.end;
  }
  return text + content.slice(position, end);
}

/**
 * Remove the original indentation of an item's continuation lines, then
 * indent every non-empty line to `depth`
 */
export function reindent(text: string, originalIndent: number, depth: number): string[] {
  const prefix = INDENT.repeat(depth);
  return text.split('\n').map((line, index) => {
    const trimmedEnd = line.trimEnd();
    if (!trimmedEnd) return '';
    if (index === 0) return prefix + trimmedEnd.trimStart();
    const leading = trimmedEnd.length - trimmedEnd.trimStart().length;
    return prefix + trimmedEnd.slice(Math.min(leading, originalIndent));
  });
}

class Emitter {
  private libraryCrates: Set<string>;

  constructor(options: EmitOptions) {
    this.libraryCrates = new Set(options.libraryCrates);
  }

  emit(crates: AssembledCrate[]): string {
    const sections: string[] = [];

    for (const { crate, items } of crates) {
      if (crate.kind === 'bin') {
        const attributes = crate.innerAttributes.flatMap(a => reindent(a, 0, 0));
        const body = this.renderSiblings(items, 0);
        sections.push([...attributes, ...(attributes.length > 0 && body ? [''] : []), body].join('\n'));
        continue;
      }

      const attributes = crate.innerAttributes.flatMap(a => reindent(a, 0, 1));
      const body = this.renderSiblings(items, 1);
      sections.push([
        `pub mod ${crate.name} {`,
        ...attributes,
        ...(attributes.length > 0 && body ? [''] : []),
        ...(body ? [body] : []),
        '}',
      ].join('\n'));
    }

    return `${sections.filter(Boolean).join('\n\n')}\n`;
  }

  private renderSiblings(items: AssembledItem[], depth: number): string {
    return items.map(item => this.render(item, depth).join('\n')).join('\n\n');
  }

  private render(assembled: AssembledItem, depth: number): string[] {
    const { item } = assembled;
    const originalIndent = item.location.column - 1;
    const lines = item.attributes.flatMap(a => reindent(a, originalIndent, depth));
    const content = item.source.content;
    const prefix = INDENT.repeat(depth);

    switch (item.kind) {
      case 'mod': {
        const header = `${item.visibility ? `${item.visibility} ` : ''}mod ${item.name}`;
        const inner = item.innerAttributes.flatMap(a => reindent(a, 0, depth + 1));
        const body = this.renderSiblings(assembled.children, depth + 1);
        if (inner.length === 0 && !body) {
          return [...lines, `${prefix}${header} {}`];
        }
        return [
          ...lines,
          `${prefix}${header} {`,
          ...inner,
          ...(inner.length > 0 && body ? [''] : []),
          ...(body ? [body] : []),
          `${prefix}}`,
        ];
      }
      case 'impl': {
        const edits = pathRewrites(item, referenceRoots(item), this.libraryCrates);
        const header = sliceWithEdits(content, item.header.start, item.header.end, edits).trimEnd();
        const body = this.renderSiblings(assembled.children, depth + 1);
        const headerLines = reindent(header, originalIndent, depth);
        if (!body) {
          return [...lines, ...headerLines.slice(0, -1), `${headerLines[headerLines.length - 1] ?? ''} {}`];
        }
        return [
          ...lines,
          ...headerLines.slice(0, -1),
          `${headerLines[headerLines.length - 1] ?? ''} {`,
          body,
          `${prefix}}`,
        ];
      }
      default: {
        const edits = pathRewrites(item, [item.node], this.libraryCrates);
        const text = sliceWithEdits(content, item.span.start, item.span.end, edits);
        return [...lines, ...reindent(text, originalIndent, depth)];
      }
    }
  }
}

export function emitFusion(crates: AssembledCrate[], options: EmitOptions): string {
  return new Emitter(options).emit(crates);
}

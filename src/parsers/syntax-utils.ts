/**
 * Helpers shared by the parser and the catalog for walking Rust syntax trees
 */

import type { SyntaxNode } from '../types/index.js';

const COMMENT_TYPES = new Set(['line_comment', 'block_comment']);

export function isComment(node: SyntaxNode): boolean {
  return COMMENT_TYPES.has(node.type);
}

/**
 * Outer attributes (`#[...]`) directly preceding the sibling at `index`.
 * Comments between attributes and the item are skipped.
 */
export function outerAttributes(siblings: SyntaxNode[], index: number): SyntaxNode[] {
  const attributes: SyntaxNode[] = [];
  for (let i = index - 1; i >= 0; i--) {
    const sibling = siblings[i];
    if (!sibling) break;
    if (sibling.type === 'attribute_item') {
      attributes.unshift(sibling);
    } else if (!isComment(sibling)) {
      break;
    }
  }
  return attributes;
}

export function compactText(text: string): string {
  return text.replace(/\s+/g, '');
}

export function isCfgTest(attributes: SyntaxNode[]): boolean {
  return attributes.some(a => compactText(a.text) === '#[cfg(test)]');
}

export function pathAttribute(attributes: SyntaxNode[]): string | null {
  for (const attribute of attributes) {
    const match = attribute.text.match(/^#\[\s*path\s*=\s*"([^"]+)"\s*\]$/);
    if (match?.[1]) return match[1];
  }
  return null;
}

export function visibilityOf(node: SyntaxNode): string | null {
  const visibility = node.namedChildren.find(c => c.type === 'visibility_modifier');
  return visibility ? visibility.text : null;
}

/**
 * Depth-first walk over named descendants, parents before children
 */
export function walk(node: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  const stack: SyntaxNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (visit(current) === false) continue;
    for (let i = current.namedChildren.length - 1; i >= 0; i--) {
      const child = current.namedChildren[i];
      if (child) stack.push(child);
    }
  }
}

export function findErrorNodes(root: SyntaxNode): SyntaxNode[] {
  const errors: SyntaxNode[] = [];
  walk(root, node => {
    if (node.type === 'ERROR') {
      errors.push(node);
      return false;
    }
    return true;
  });
  return errors;
}

/**
 * Reference extraction: plain-name references an item makes to other items
 */

import type { Item, ItemReference, ReferenceKind, SyntaxNode } from '../types/index.js';
import { walk } from '../parsers/syntax-utils.js';

const IDENTIFIER_TYPES = new Set(['identifier', 'type_identifier', 'field_identifier']);

const KEYWORDS = new Set(['self', 'Self', 'crate', 'super']);

const SCOPED_TYPES = new Set(['scoped_identifier', 'scoped_type_identifier']);

// bindings and labels local to an item body
const SKIPPED_PARENTS = new Set(['lifetime', 'label', 'field_pattern']);

// nodes whose `name` field refers to an item instead of declaring one
const NAMING_PARENTS = new Set(['struct_expression']);

function sameNode(a: SyntaxNode | null, b: SyntaxNode): boolean {
  return a !== null && a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

/**
 * Last segment of a path node, generics dropped
 */
function lastSegment(node: SyntaxNode): string {
  switch (node.type) {
    case 'scoped_identifier':
    case 'scoped_type_identifier':
      return node.childForFieldName('name')?.text ?? node.text;
    case 'generic_type': {
      const inner = node.childForFieldName('type');
      return inner ? lastSegment(inner) : node.text;
    }
    default:
      return node.text;
  }
}

function isCallee(node: SyntaxNode): boolean {
  const parent = node.parent;
  return parent !== null && parent.type === 'call_expression' && sameNode(parent.childForFieldName('function'), node);
}

/**
 * Classify an identifier inside a macro token tree from the surrounding text,
 * token trees carry no path structure
 */
function classifyInTokenTree(node: SyntaxNode, content: string): Pick<ItemReference, 'kind' | 'qualifier' | 'pathRoot'> {
  const before = content.slice(Math.max(0, node.startIndex - 200), node.startIndex);
  const after = content.slice(node.endIndex, node.endIndex + 8);

  const qualified = before.match(/([A-Za-z_][A-Za-z0-9_]*)\s*::\s*$/);
  const pathRoot = !qualified && /^\s*::/.test(after);

  let kind: ReferenceKind = 'value';
  if (/\.\s*$/.test(before)) kind = 'method';
  else if (/^\s*\(/.test(after)) kind = 'call';
  else if (/^\s*!/.test(after)) kind = 'macro';
  else if (qualified || pathRoot) kind = 'path';
  else if (/^[A-Z]/.test(node.text)) kind = 'type';

  return { kind, qualifier: qualified?.[1] ?? null, pathRoot };
}

function classify(node: SyntaxNode, content: string): Pick<ItemReference, 'kind' | 'qualifier' | 'pathRoot'> | null {
  const parent = node.parent;
  if (!parent) return null;

  if (parent.type === 'token_tree') {
    return classifyInTokenTree(node, content);
  }

  if (SKIPPED_PARENTS.has(parent.type)) return null;
  if (sameNode(parent.childForFieldName('pattern'), node)) return null;

  if (SCOPED_TYPES.has(parent.type) || parent.type === 'scoped_use_list') {
    const pathNode = parent.childForFieldName('path');
    if (sameNode(pathNode, node)) {
      return { kind: 'path', qualifier: null, pathRoot: true };
    }
    if (sameNode(parent.childForFieldName('name'), node)) {
      return {
        kind: isCallee(parent) ? 'call' : parent.type === 'scoped_type_identifier' ? 'type' : 'path',
        qualifier: pathNode ? lastSegment(pathNode) : null,
        pathRoot: false,
      };
    }
  }

  if (node.type === 'field_identifier') {
    // only method calls name items; plain field access and declarations name fields
    if (parent.type === 'field_expression' && isCallee(parent)) {
      return { kind: 'method', qualifier: null, pathRoot: false };
    }
    return null;
  }

  // the name a declaration introduces
  if (!NAMING_PARENTS.has(parent.type) && sameNode(parent.childForFieldName('name'), node)) return null;

  if (parent.type === 'macro_invocation') {
    return { kind: 'macro', qualifier: null, pathRoot: false };
  }
  if (isCallee(node)) {
    return { kind: 'call', qualifier: null, pathRoot: false };
  }
  if (node.type === 'type_identifier') {
    return { kind: 'type', qualifier: null, pathRoot: false };
  }
  return { kind: 'value', qualifier: null, pathRoot: false };
}

/**
 * Syntax nodes scanned for an item's references: the impl header for
 * impl blocks, nothing for modules, the whole item otherwise
 */
export function referenceRoots(item: Item): SyntaxNode[] {
  switch (item.kind) {
    case 'mod':
      return [];
    case 'impl': {
      const header = [
        item.node.childForFieldName('type_parameters'),
        item.node.childForFieldName('trait'),
        item.node.childForFieldName('type'),
        item.node.namedChildren.find(c => c.type === 'where_clause') ?? null,
      ];
      return header.filter((node): node is SyntaxNode => node !== null);
    }
    default:
      return [item.node];
  }
}

export function extractReferences(item: Item): ItemReference[] {
  const references: ItemReference[] = [];
  const content = item.source.content;
  const ownName = item.node.childForFieldName('name');

  for (const root of referenceRoots(item)) {
    walk(root, node => {
      if (!IDENTIFIER_TYPES.has(node.type) || KEYWORDS.has(node.text)) return;
      if (ownName && sameNode(ownName, node)) return;

      const classified = classify(node, content);
      if (!classified) return;

      references.push({
        name: node.text,
        ...classified,
        span: { start: node.startIndex, end: node.endIndex },
        location: {
          filePath: item.source.path,
          line: node.startPosition.row + 1,
          column: node.startPosition.column + 1,
          endLine: node.endPosition.row + 1,
        },
      });
    });
  }

  return references;
}

/**
 * Syntax tree shape consumed by the catalog and the reference extractor.
 *
 * Mirrors the subset of the tree-sitter node API the core relies on, so the
 * core never imports the parser binding directly.
 */

export interface Point {
  row: number;
  column: number;
}

export interface SyntaxNode {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: Point;
  endPosition: Point;
  namedChildren: SyntaxNode[];
  parent: SyntaxNode | null;
  childForFieldName(name: string): SyntaxNode | null;
}

export interface SourceFile {
  path: string;
  content: string;
}

export interface ParsedSource {
  file: SourceFile;
  root: SyntaxNode;
}

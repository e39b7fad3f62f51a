/**
 * Rust parser using tree-sitter
 */

import Parser from 'tree-sitter';
import Rust from 'tree-sitter-rust';

import type { SyntaxNode } from '../types/index.js';
import { SourceParser, type ModuleDeclaration, type ParseError, type ParseResult, type ParserOptions } from './base.js';
import { findErrorNodes, isCfgTest, outerAttributes, pathAttribute } from './syntax-utils.js';

// tree-sitter reads string input in chunks; large files must go through a callback
const CHUNK_SIZE = 16 * 1024;

export class RustParser extends SourceParser {
  private parser: Parser;

  constructor(options: ParserOptions = {}) {
    super(options);
    this.parser = new Parser();
    this.parser.setLanguage(Rust);
  }

  get language(): string {
    return 'rust';
  }

  get extensions(): string[] {
    return ['rs'];
  }

  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  async parseFile(filePath: string, content: string): Promise<ParseResult> {
    if (this.isFileTooLarge(content)) {
      const size = Buffer.byteLength(content, 'utf8');
      throw new Error(
        `File too large to parse: ${filePath} (${this.formatBytes(size)} exceeds ${this.formatBytes(this.options.maxFileSize ?? 0)})`
      );
    }

    const tree = this.parser.parse((index: number) =>
      index < content.length ? content.slice(index, index + CHUNK_SIZE) : null
    );
    const root = tree.rootNode as unknown as SyntaxNode;

    const errors: ParseError[] = findErrorNodes(root).map(node => ({
      message: `Syntax error near '${node.text.slice(0, 40)}'`,
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
      severity: 'warning',
    }));

    return {
      root,
      moduleDeclarations: this.extractModuleDeclarations(root, []),
      errors,
    };
  }

  private extractModuleDeclarations(container: SyntaxNode, parentPath: string[]): ModuleDeclaration[] {
    const declarations: ModuleDeclaration[] = [];
    const children = container.namedChildren;

    children.forEach((child, index) => {
      if (child.type !== 'mod_item') return;
      const name = child.childForFieldName('name')?.text;
      if (!name) return;

      const attributes = outerAttributes(children, index);
      const body = child.childForFieldName('body');
      if (body) {
        if (!isCfgTest(attributes)) {
          declarations.push(...this.extractModuleDeclarations(body, [...parentPath, name]));
        }
        return;
      }

      declarations.push({
        name,
        parentPath,
        pathAttribute: pathAttribute(attributes),
        cfgTest: isCfgTest(attributes),
        line: child.startPosition.row + 1,
      });
    });

    return declarations;
  }
}

// Singleton parser instance
let defaultParser: RustParser | null = null;

export function getDefaultParser(options: ParserOptions = {}): RustParser {
  if (!defaultParser) {
    defaultParser = new RustParser(options);
  }
  return defaultParser;
}

export function resetParser(): void {
  defaultParser = null;
}

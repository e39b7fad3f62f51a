/**
 * Abstract base class for source parsers
 */

import type { SyntaxNode } from '../types/index.js';

export interface ModuleDeclaration {
  name: string;
  /** Path of inline modules enclosing the declaration, relative to the file */
  parentPath: string[];
  /** Value of a `#[path = "..."]` attribute */
  pathAttribute: string | null;
  cfgTest: boolean;
  line: number;
}

export interface ParseResult {
  root: SyntaxNode;
  moduleDeclarations: ModuleDeclaration[];
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line?: number;
  column?: number;
  severity: 'error' | 'warning';
}

export interface ParserOptions {
  maxFileSize?: number;
}

export abstract class SourceParser {
  protected options: ParserOptions;

  constructor(options: ParserOptions = {}) {
    this.options = {
      maxFileSize: 1024 * 1024, // 1MB
      ...options,
    };
  }

  /**
   * Check if this parser can handle the given file
   */
  abstract canParse(filePath: string): boolean;

  /**
   * Parse a file into a syntax tree
   */
  abstract parseFile(filePath: string, content: string): Promise<ParseResult>;

  abstract get language(): string;

  abstract get extensions(): string[];

  /**
   * Check if content exceeds max file size
   */
  protected isFileTooLarge(content: string): boolean {
    return Buffer.byteLength(content, 'utf8') > (this.options.maxFileSize ?? Infinity);
  }

  protected formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
}

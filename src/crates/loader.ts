/**
 * Loads the source files of a crate by following `mod x;` declarations
 */

import fs from 'node:fs';
import path from 'node:path';

import type { CrateKind, ParsedCrate, ParsedSource } from '../types/index.js';
import { ModuleNotFoundError } from '../errors.js';
import { getDefaultParser, type RustParser } from '../parsers/rust.js';
import type { ParseError, ParseResult } from '../parsers/base.js';

export interface CrateSource {
  name: string;
  kind: CrateKind;
  rootFile: string;
}

export interface LoadedCrate {
  crate: ParsedCrate;
  files: string[];
  warnings: Array<{ file: string; error: ParseError }>;
}

interface PendingFile {
  filePath: string;
  modulePath: string[];
  /** Directory holding the files of this module's child modules */
  childDir: string;
}

const ROOT_FILE_NAMES = new Set(['main.rs', 'lib.rs', 'mod.rs']);

/**
 * Rust identifiers cannot contain '-', crate names in manifests can
 */
export function normalizeCrateName(name: string): string {
  return name.replace(/-/g, '_');
}

export async function loadCrate(source: CrateSource, parser: RustParser = getDefaultParser()): Promise<LoadedCrate> {
  const rootFile = path.resolve(source.rootFile);
  const modules = new Map<string, ParsedSource>();
  const files: string[] = [];
  const warnings: Array<{ file: string; error: ParseError }> = [];

  const parseSource = async (filePath: string): Promise<{ parsed: ParsedSource; result: ParseResult }> => {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const result = await parser.parseFile(filePath, content);
    files.push(filePath);
    for (const error of result.errors) {
      warnings.push({ file: filePath, error });
    }
    return { parsed: { file: { path: filePath, content }, root: result.root }, result };
  };

  const { parsed: root, result: rootResult } = await parseSource(rootFile);
  const queue: Array<PendingFile & { declarations: ParseResult['moduleDeclarations'] }> = [
    {
      filePath: rootFile,
      modulePath: [],
      childDir: path.dirname(rootFile),
      declarations: rootResult.moduleDeclarations,
    },
  ];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;

    for (const declaration of current.declarations) {
      if (declaration.cfgTest) continue;

      const baseDir = path.join(current.childDir, ...declaration.parentPath);
      const candidates = declaration.pathAttribute
        ? [path.resolve(declaration.parentPath.length > 0 ? baseDir : path.dirname(current.filePath), declaration.pathAttribute)]
        : [path.join(baseDir, `${declaration.name}.rs`), path.join(baseDir, declaration.name, 'mod.rs')];

      const filePath = candidates.find(candidate => fs.existsSync(candidate));
      if (!filePath) {
        throw new ModuleNotFoundError(
          [...current.modulePath, ...declaration.parentPath, declaration.name].join('::'),
          candidates
        );
      }

      const modulePath = [...current.modulePath, ...declaration.parentPath, declaration.name];
      const { parsed, result } = await parseSource(filePath);
      modules.set(modulePath.join('::'), parsed);

      const isModRs = declaration.pathAttribute !== null || ROOT_FILE_NAMES.has(path.basename(filePath));
      queue.push({
        filePath,
        modulePath,
        childDir: isModRs ? path.dirname(filePath) : path.join(path.dirname(filePath), path.basename(filePath, '.rs')),
        declarations: result.moduleDeclarations,
      });
    }
  }

  return {
    crate: {
      name: normalizeCrateName(source.name),
      kind: source.kind,
      root,
      modules,
    },
    files,
    warnings,
  };
}

export async function loadCrates(sources: CrateSource[], parser?: RustParser): Promise<LoadedCrate[]> {
  const loaded: LoadedCrate[] = [];
  // crate order is the emission order
  for (const source of sources) {
    loaded.push(await loadCrate(source, parser));
  }
  return loaded;
}

/**
 * Catalog item types
 */

import type { ParsedSource, SourceFile, SyntaxNode } from './syntax.js';

export type CrateKind = 'bin' | 'lib';
export type ItemId = string;

export type FreeItemKind = 'fn' | 'const' | 'static' | 'type' | 'struct' | 'enum' | 'trait';
export type ItemKind = FreeItemKind | 'mod' | 'use' | 'impl' | 'impl_item';
export type ImplItemKind = 'fn' | 'const' | 'type';

export interface ParsedCrate {
  name: string;
  kind: CrateKind;
  root: ParsedSource;
  /** Files of body-less `mod x;` declarations, keyed by module path joined with `::` */
  modules: Map<string, ParsedSource>;
}

export interface Location {
  filePath: string;
  line: number;
  column: number;
  endLine: number;
}

export interface TextSpan {
  start: number;
  end: number;
}

export interface QualifiedBlockName {
  /** Generic parameter list including angle brackets, e.g. `<T:Copy>` */
  generics: string | null;
  traitPath: string | null;
  typePath: string;
  /** Where-clause predicates without the `where` keyword */
  whereClause: string | null;
}

export interface UseImport {
  path: string[];
  alias: string | null;
  glob: boolean;
}

interface ItemBase {
  id: ItemId;
  name: string;
  crate: string;
  crateKind: CrateKind;
  /** Identity prefix of the crate, see {@link CatalogCrate.idPrefix} */
  crateId: string;
  modulePath: string[];
  /** Enclosing module item, or owning impl block for impl items */
  parentId: ItemId | null;
  location: Location;
  source: SourceFile;
  span: TextSpan;
  /** Outer attributes (`#[...]`) in source order */
  attributes: string[];
  visibility: string | null;
  node: SyntaxNode;
  order: number;
}

export interface FreeItem extends ItemBase {
  kind: FreeItemKind;
}

export interface ModuleItem extends ItemBase {
  kind: 'mod';
  children: ItemId[];
  /** Inner attributes (`#![...]`) of the module body or file */
  innerAttributes: string[];
}

export interface UseItem extends ItemBase {
  kind: 'use';
  imports: UseImport[];
}

export interface ImplBlock extends ItemBase {
  kind: 'impl';
  qualifiedName: string;
  parsedName: QualifiedBlockName;
  /** Last segment of the self type path, generics dropped */
  selfTypeName: string;
  header: TextSpan;
  children: ItemId[];
}

export interface ImplItem extends ItemBase {
  kind: 'impl_item';
  itemKind: ImplItemKind;
  blockId: ItemId;
}

export type Item = FreeItem | ModuleItem | UseItem | ImplBlock | ImplItem;

export function isTraitImpl(block: ImplBlock): boolean {
  return block.parsedName.traitPath !== null;
}

export interface CatalogCrate {
  name: string;
  kind: CrateKind;
  /** Identity prefix: `crate` for the binary crate, the crate name for libraries */
  idPrefix: string;
  innerAttributes: string[];
  /** Top-level items in declaration order */
  items: ItemId[];
}

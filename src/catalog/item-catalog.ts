/**
 * Item Catalog: flat collection of every top-level item, impl block and
 * impl item across the fused crates, keyed by stable identity.
 */

import type {
  CatalogCrate,
  FreeItem,
  FreeItemKind,
  ImplBlock,
  ImplItem,
  ImplItemKind,
  Item,
  ItemId,
  Location,
  ModuleItem,
  ParsedCrate,
  SourceFile,
  SyntaxNode,
  UseImport,
  UseItem,
} from '../types/index.js';
import { DuplicateItemIdentityError, ModuleNotFoundError, UnsupportedItemKindError } from '../errors.js';
import { isCfgTest, isComment, outerAttributes, visibilityOf } from '../parsers/syntax-utils.js';
import { formatQualifiedBlockName, qualifiedNameFromNode, typeNameFromNode } from './qualified-name.js';

const FREE_ITEM_KINDS: Record<string, FreeItemKind> = {
  function_item: 'fn',
  const_item: 'const',
  static_item: 'static',
  type_item: 'type',
  struct_item: 'struct',
  enum_item: 'enum',
  trait_item: 'trait',
};

const IMPL_ITEM_KINDS: Record<string, ImplItemKind> = {
  function_item: 'fn',
  const_item: 'const',
  type_item: 'type',
};

const SKIPPED_NODES = new Set(['attribute_item', 'inner_attribute_item', 'empty_statement', 'line_comment', 'block_comment']);

const PATH_KEYWORDS = new Set(['crate', 'self', 'super']);

interface Container {
  crate: ParsedCrate;
  idPrefix: string;
  source: SourceFile;
  modulePath: string[];
  parentId: ItemId | null;
}

export interface CatalogOptions {
  /** Crate names whose `extern crate` declarations are dropped because the crate is fused */
  fusedCrates?: string[];
}

export function itemIdentity(idPrefix: string, modulePath: string[], kind: string, name: string): ItemId {
  return `${[idPrefix, ...modulePath].join('::')}#${kind}:${name}`;
}

export function moduleKey(crateId: string, modulePath: string[]): string {
  return [crateId, ...modulePath].join('::');
}

export class ItemCatalog {
  private items = new Map<ItemId, Item>();
  private crateRecords: CatalogCrate[] = [];
  private freeByName = new Map<string, ItemId[]>();
  private implItemsByName = new Map<string, ItemId[]>();
  private usesByModule = new Map<string, ItemId[]>();
  private fusedCrates: Set<string>;

  private constructor(options: CatalogOptions) {
    this.fusedCrates = new Set(options.fusedCrates ?? []);
  }

  /**
   * Build the catalog from parsed crates, in the given order
   */
  static build(crates: ParsedCrate[], options: CatalogOptions = {}): ItemCatalog {
    const catalog = new ItemCatalog({
      fusedCrates: options.fusedCrates ?? crates.filter(c => c.kind === 'lib').map(c => c.name),
    });
    for (const crate of crates) {
      catalog.addCrate(crate);
    }
    return catalog;
  }

  get crates(): readonly CatalogCrate[] {
    return this.crateRecords;
  }

  get size(): number {
    return this.items.size;
  }

  get(id: ItemId): Item | undefined {
    return this.items.get(id);
  }

  require(id: ItemId): Item {
    const item = this.items.get(id);
    if (!item) {
      throw new Error(`Unknown item '${id}'`);
    }
    return item;
  }

  has(id: ItemId): boolean {
    return this.items.has(id);
  }

  /**
   * All items in insertion (declaration) order
   */
  all(): Item[] {
    return Array.from(this.items.values());
  }

  implBlocks(): ImplBlock[] {
    return this.all().filter((item): item is ImplBlock => item.kind === 'impl');
  }

  /**
   * Free items (and modules) with the given plain name
   */
  freeItemsNamed(name: string): Array<FreeItem | ModuleItem> {
    return (this.freeByName.get(name) ?? []).flatMap(id => {
      const item = this.items.get(id);
      return item && (item.kind !== 'impl' && item.kind !== 'impl_item' && item.kind !== 'use') ? [item] : [];
    });
  }

  implItemsNamed(name: string): ImplItem[] {
    return (this.implItemsByName.get(name) ?? []).flatMap(id => {
      const item = this.items.get(id);
      return item?.kind === 'impl_item' ? [item] : [];
    });
  }

  /**
   * Use declarations directly inside a module
   */
  usesIn(crateId: string, modulePath: string[]): UseItem[] {
    return (this.usesByModule.get(moduleKey(crateId, modulePath)) ?? []).flatMap(id => {
      const item = this.items.get(id);
      return item?.kind === 'use' ? [item] : [];
    });
  }

  blockOf(item: ImplItem): ImplBlock {
    const block = this.require(item.blockId);
    if (block.kind !== 'impl') {
      throw new Error(`Item '${item.blockId}' is not an impl block`);
    }
    return block;
  }

  childrenOf(id: ItemId): Item[] {
    const item = this.items.get(id);
    if (!item || (item.kind !== 'mod' && item.kind !== 'impl')) return [];
    return item.children.flatMap(childId => {
      const child = this.items.get(childId);
      return child ? [child] : [];
    });
  }

  /**
   * Enclosing impl block of an item, when the item is an impl item
   */
  enclosingBlock(item: Item): ImplBlock | null {
    return item.kind === 'impl_item' ? this.blockOf(item) : item.kind === 'impl' ? item : null;
  }

  private addCrate(crate: ParsedCrate): void {
    const idPrefix = crate.kind === 'bin' ? 'crate' : crate.name;
    const root = crate.root;
    const record: CatalogCrate = {
      name: crate.name,
      kind: crate.kind,
      idPrefix,
      innerAttributes: innerAttributesOf(root.root.namedChildren),
      items: [],
    };
    this.crateRecords.push(record);

    record.items = this.addContainer(
      { crate, idPrefix, source: root.file, modulePath: [], parentId: null },
      root.root.namedChildren
    );
  }

  private addContainer(container: Container, nodes: SyntaxNode[]): ItemId[] {
    const ids: ItemId[] = [];
    const counts = new Map<string, number>();

    nodes.forEach((node, index) => {
      if (SKIPPED_NODES.has(node.type) || isComment(node)) return;

      const attributes = outerAttributes(nodes, index);
      if (isCfgTest(attributes)) return;
      const attributeTexts = attributes.map(a => a.text);

      const freeKind = FREE_ITEM_KINDS[node.type];
      if (freeKind) {
        const name = node.childForFieldName('name')?.text;
        if (!name) throw new UnsupportedItemKindError(node.type, this.locationOf(container.source, node));
        const item: FreeItem = {
          ...this.base(container, node, attributeTexts, itemIdentity(container.idPrefix, container.modulePath, freeKind, name), name),
          kind: freeKind,
        };
        ids.push(this.add(item));
        return;
      }

      switch (node.type) {
        case 'mod_item':
          ids.push(this.addModule(container, node, attributeTexts));
          return;
        case 'use_declaration':
        case 'extern_crate_declaration': {
          const id = this.addUse(container, node, attributeTexts, counts);
          if (id) ids.push(id);
          return;
        }
        case 'impl_item':
          ids.push(this.addImplBlock(container, node, attributeTexts, counts));
          return;
        default:
          throw new UnsupportedItemKindError(
            node.type === 'macro_invocation' ? `macro invocation '${node.childForFieldName('macro')?.text ?? ''}!'` : node.type,
            this.locationOf(container.source, node)
          );
      }
    });

    return ids;
  }

  private addModule(container: Container, node: SyntaxNode, attributes: string[]): ItemId {
    const name = node.childForFieldName('name')?.text ?? '';
    const modulePath = [...container.modulePath, name];
    const body = node.childForFieldName('body');

    let childSource = container.source;
    let childNodes: SyntaxNode[];
    if (body) {
      childNodes = body.namedChildren;
    } else {
      const file = container.crate.modules.get(modulePath.join('::'));
      if (!file) {
        throw new ModuleNotFoundError(modulePath.join('::'), []);
      }
      childSource = file.file;
      childNodes = file.root.namedChildren;
    }

    const module: ModuleItem = {
      ...this.base(container, node, attributes, itemIdentity(container.idPrefix, container.modulePath, 'mod', name), name),
      kind: 'mod',
      children: [],
      innerAttributes: innerAttributesOf(childNodes),
    };
    this.add(module);

    module.children = this.addContainer(
      { crate: container.crate, idPrefix: container.idPrefix, source: childSource, modulePath, parentId: module.id },
      childNodes
    );
    return module.id;
  }

  private addUse(container: Container, node: SyntaxNode, attributes: string[], counts: Map<string, number>): ItemId | null {
    let imports: UseImport[];
    let name: string;

    if (node.type === 'extern_crate_declaration') {
      name = node.childForFieldName('name')?.text ?? '';
      if (this.fusedCrates.has(name)) return null;
      const alias = node.childForFieldName('alias')?.text ?? null;
      imports = [{ path: [name], alias, glob: false }];
    } else {
      const argument = node.childForFieldName('argument');
      imports = argument ? parseUseTree(argument, []) : [];
      name = imports.map(i => i.alias ?? (i.glob ? '*' : (i.path[i.path.length - 1] ?? ''))).join(',');
    }

    const id = itemIdentity(container.idPrefix, container.modulePath, 'use', numbered(counts, `use:${name}`, name));
    const item: UseItem = {
      ...this.base(container, node, attributes, id, name),
      kind: 'use',
      imports,
    };
    this.add(item);

    const key = moduleKey(container.idPrefix, container.modulePath);
    const uses = this.usesByModule.get(key) ?? [];
    uses.push(id);
    this.usesByModule.set(key, uses);
    return id;
  }

  private addImplBlock(container: Container, node: SyntaxNode, attributes: string[], counts: Map<string, number>): ItemId {
    const parsedName = qualifiedNameFromNode(node);
    const qualifiedName = formatQualifiedBlockName(parsedName);

    const body = node.childForFieldName('body');
    const typeNode = node.childForFieldName('type');
    const id = itemIdentity(container.idPrefix, container.modulePath, 'impl', numbered(counts, `impl:${qualifiedName}`, qualifiedName));

    const block: ImplBlock = {
      ...this.base(container, node, attributes, id, qualifiedName),
      kind: 'impl',
      qualifiedName,
      parsedName,
      selfTypeName: typeNode ? typeNameFromNode(typeNode) : '',
      header: { start: node.startIndex, end: body ? body.startIndex : node.endIndex },
      children: [],
    };
    this.add(block);

    const members = body ? body.namedChildren : [];
    members.forEach((member, index) => {
      if (SKIPPED_NODES.has(member.type) || isComment(member)) return;

      const memberAttributes = outerAttributes(members, index);
      if (isCfgTest(memberAttributes)) return;

      const itemKind = IMPL_ITEM_KINDS[member.type];
      const name = member.childForFieldName('name')?.text;
      if (!itemKind || !name) {
        throw new UnsupportedItemKindError(`impl ${member.type}`, this.locationOf(container.source, member));
      }

      const item: ImplItem = {
        ...this.base(
          { ...container, parentId: block.id },
          member,
          memberAttributes.map(a => a.text),
          `${block.id}/${itemKind}:${name}`,
          name
        ),
        kind: 'impl_item',
        itemKind,
        blockId: block.id,
      };
      block.children.push(this.add(item));
    });

    return block.id;
  }

  private base(container: Container, node: SyntaxNode, attributes: string[], id: ItemId, name: string) {
    return {
      id,
      name,
      crate: container.crate.name,
      crateKind: container.crate.kind,
      crateId: container.idPrefix,
      modulePath: container.modulePath,
      parentId: container.parentId,
      location: this.locationOf(container.source, node),
      source: container.source,
      span: { start: node.startIndex, end: node.endIndex },
      attributes,
      visibility: visibilityOf(node),
      node,
      order: this.items.size,
    };
  }

  private add(item: Item): ItemId {
    const existing = this.items.get(item.id);
    if (existing) {
      throw new DuplicateItemIdentityError(item.id, [existing.location, item.location]);
    }
    this.items.set(item.id, item);

    if (item.kind === 'impl_item') {
      const ids = this.implItemsByName.get(item.name) ?? [];
      ids.push(item.id);
      this.implItemsByName.set(item.name, ids);
    } else if (item.kind !== 'impl' && item.kind !== 'use') {
      const ids = this.freeByName.get(item.name) ?? [];
      ids.push(item.id);
      this.freeByName.set(item.name, ids);
    }
    return item.id;
  }

  private locationOf(source: SourceFile, node: SyntaxNode): Location {
    return {
      filePath: source.path,
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
      endLine: node.endPosition.row + 1,
    };
  }
}

/**
 * `name` for the first occurrence in a container, `name#n` for the n-th
 */
function numbered(counts: Map<string, number>, key: string, name: string): string {
  const count = (counts.get(key) ?? 0) + 1;
  counts.set(key, count);
  return count > 1 ? `${name}#${count}` : name;
}

function innerAttributesOf(nodes: SyntaxNode[]): string[] {
  return nodes.filter(n => n.type === 'inner_attribute_item').map(n => n.text);
}

function pathSegments(node: SyntaxNode | null): string[] {
  if (!node) return [];
  if (node.type === 'scoped_identifier') {
    const name = node.childForFieldName('name');
    return [...pathSegments(node.childForFieldName('path')), ...(name ? [name.text] : [])];
  }
  return [node.text];
}

/**
 * Flatten a use tree into the paths it imports
 */
export function parseUseTree(node: SyntaxNode, prefix: string[]): UseImport[] {
  switch (node.type) {
    case 'use_as_clause':
      return [{
        path: [...prefix, ...pathSegments(node.childForFieldName('path'))],
        alias: node.childForFieldName('alias')?.text ?? null,
        glob: false,
      }];
    case 'use_list':
      return node.namedChildren.filter(c => !isComment(c)).flatMap(c => parseUseTree(c, prefix));
    case 'scoped_use_list': {
      const list = node.childForFieldName('list');
      const segments = [...prefix, ...pathSegments(node.childForFieldName('path'))];
      return list ? parseUseTree(list, segments) : [];
    }
    case 'use_wildcard': {
      const inner = node.namedChildren.find(c => !isComment(c)) ?? null;
      return [{ path: [...prefix, ...pathSegments(inner)], alias: null, glob: true }];
    }
    default: {
      const path = [...prefix, ...pathSegments(node)];
      // `use foo::{self}` imports the module `foo`
      if (path.length > 1 && path[path.length - 1] === 'self') path.pop();
      return [{ path, alias: null, glob: false }];
    }
  }
}

/**
 * Name a use import binds in its module, `null` for globs and bare keywords
 */
export function importedName(useImport: UseImport): string | null {
  if (useImport.glob) return null;
  if (useImport.alias) return useImport.alias === '_' ? null : useImport.alias;
  const last = useImport.path[useImport.path.length - 1];
  return last && !PATH_KEYWORDS.has(last) ? last : null;
}

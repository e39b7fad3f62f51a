/**
 * Dependency graph over catalog items
 */

import type {
  AmbiguousEdge,
  DependencyEdge,
  EdgeKind,
  FreeItem,
  Item,
  ItemId,
  ItemReference,
  ModuleItem,
  UseItem,
} from '../types/index.js';
import { isTraitImpl } from '../types/index.js';
import { importedName, type ItemCatalog } from '../catalog/item-catalog.js';
import { extractReferences } from './reference-extractor.js';

export class DependencyGraph {
  private outgoing = new Map<ItemId, DependencyEdge[]>();
  private incoming = new Map<ItemId, DependencyEdge[]>();
  private ambiguousByItem = new Map<ItemId, AmbiguousEdge[]>();
  private references = new Map<ItemId, ItemReference[]>();
  private edgeKeys = new Set<string>();
  private count = 0;

  constructor(readonly nodes: readonly ItemId[]) {}

  get edgeCount(): number {
    return this.count;
  }

  /**
   * Add an edge; repeated edges between the same pair are ignored
   */
  addEdge(from: ItemId, to: ItemId, kind: EdgeKind, reference: ItemReference | null = null): boolean {
    if (from === to) return false;
    const key = `${from}\u0000${to}`;
    if (this.edgeKeys.has(key)) return false;
    this.edgeKeys.add(key);

    const edge: DependencyEdge = { from, to, kind, reference };
    append(this.outgoing, from, edge);
    append(this.incoming, to, edge);
    this.count++;
    return true;
  }

  addAmbiguousEdge(edge: AmbiguousEdge): boolean {
    const existing = this.ambiguousByItem.get(edge.from) ?? [];
    if (existing.some(e => e.name === edge.name && e.qualifier === edge.qualifier)) return false;
    append(this.ambiguousByItem, edge.from, edge);
    return true;
  }

  setReferences(id: ItemId, references: ItemReference[]): void {
    this.references.set(id, references);
  }

  edgesFrom(id: ItemId): DependencyEdge[] {
    return this.outgoing.get(id) ?? [];
  }

  edgesTo(id: ItemId): DependencyEdge[] {
    return this.incoming.get(id) ?? [];
  }

  ambiguousFrom(id: ItemId): AmbiguousEdge[] {
    return this.ambiguousByItem.get(id) ?? [];
  }

  referencesOf(id: ItemId): ItemReference[] {
    return this.references.get(id) ?? [];
  }

  /**
   * Items referencing `id` by name, through an unambiguous or an ambiguous edge
   */
  referrersOf(id: ItemId): Array<{ from: ItemId; reference: ItemReference | null }> {
    const referrers: Array<{ from: ItemId; reference: ItemReference | null }> = this.edgesTo(id)
      .filter(e => e.kind === 'reference' || e.kind === 'import')
      .map(e => ({ from: e.from, reference: e.reference }));

    for (const nodeId of this.nodes) {
      for (const edge of this.ambiguousFrom(nodeId)) {
        if (edge.candidates.includes(id)) {
          referrers.push({ from: edge.from, reference: edge.reference });
        }
      }
    }
    return referrers;
  }
}

function append<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

const PATH_KEYWORDS = new Set(['crate', 'self', 'super']);

class GraphBuilder {
  private graph: DependencyGraph;

  constructor(private readonly catalog: ItemCatalog) {
    this.graph = new DependencyGraph(catalog.all().map(item => item.id));
  }

  build(): DependencyGraph {
    for (const item of this.catalog.all()) {
      this.addStructuralEdges(item);

      const references = extractReferences(item);
      this.graph.setReferences(item.id, references);

      if (item.kind === 'use') {
        this.resolveUse(item);
        continue;
      }
      for (const reference of references) {
        this.resolveReference(item, reference);
      }
    }
    return this.graph;
  }

  private addStructuralEdges(item: Item): void {
    if (item.kind === 'impl_item') {
      this.graph.addEdge(item.id, item.blockId, 'owner');
    } else if (item.parentId) {
      this.graph.addEdge(item.id, item.parentId, 'parent');
    }

    if (item.kind === 'impl' && isTraitImpl(item)) {
      for (const childId of item.children) {
        this.graph.addEdge(item.id, childId, 'atomic');
      }
    }
  }

  private resolveReference(item: Item, reference: ItemReference): void {
    if (reference.kind !== 'method') {
      this.resolveFreeReference(item, reference);
    }
    if (reference.pathRoot || reference.kind === 'macro' || this.isModuleQualifier(reference.qualifier)) return;

    const implItems = this.catalog
      .implItemsNamed(reference.name)
      .filter(candidate => candidate.id !== item.id && (reference.kind !== 'type' || candidate.itemKind === 'type'));

    const [single] = implItems;
    if (implItems.length === 1 && single) {
      this.graph.addEdge(item.id, single.id, 'reference', reference);
    } else if (implItems.length > 1) {
      this.graph.addAmbiguousEdge({
        from: item.id,
        name: reference.name,
        qualifier: reference.qualifier,
        candidates: implItems.map(candidate => candidate.id),
        reference,
      });
    }
  }

  /**
   * Resolve a name against use declarations and free items: the enclosing
   * module first, then the crate, then every crate
   */
  private resolveFreeReference(item: Item, reference: ItemReference): void {
    const { name } = reference;

    const namedUses = this.catalog
      .usesIn(item.crateId, item.modulePath)
      .filter(use => use.id !== item.id && use.imports.some(i => importedName(i) === name));
    if (namedUses.length > 0) {
      for (const use of namedUses) {
        this.graph.addEdge(item.id, use.id, 'reference', reference);
      }
      return;
    }

    const freeItems = this.catalog.freeItemsNamed(name).filter(candidate => candidate.id !== item.id);
    const inModule = freeItems.filter(c => c.crateId === item.crateId && sameModule(c.modulePath, item.modulePath));

    let targets: Array<FreeItem | ModuleItem> = inModule;
    if (inModule.length === 0) {
      for (const use of this.catalog.usesIn(item.crateId, item.modulePath)) {
        if (use.id !== item.id && use.imports.some(i => i.glob && this.globProvides(use, i.path, name))) {
          this.graph.addEdge(item.id, use.id, 'reference', reference);
        }
      }
      const inCrate = freeItems.filter(c => c.crateId === item.crateId);
      targets = inCrate.length > 0 ? inCrate : freeItems;
    }
    for (const target of targets) {
      this.graph.addEdge(item.id, target.id, 'reference', reference);
    }
  }

  /**
   * `module::name` paths never name impl items
   */
  private isModuleQualifier(qualifier: string | null): boolean {
    if (!qualifier) return false;
    if (PATH_KEYWORDS.has(qualifier)) return true;
    if (this.catalog.crates.some(c => c.name === qualifier)) return true;
    return this.catalog.freeItemsNamed(qualifier).some(c => c.kind === 'mod');
  }

  /**
   * Crate and module a use path's leading segments point at; `null` for
   * paths rooted outside the fused crates
   */
  private resolveUsePath(use: UseItem, path: string[]): { crateId: string; modulePath: string[] } | null {
    const [first, ...rest] = path;
    if (!first) return null;

    let crateId: string;
    let modulePath: string[];
    if (first === 'crate') {
      crateId = use.crateId;
      modulePath = [];
    } else if (first === 'self') {
      crateId = use.crateId;
      modulePath = [...use.modulePath];
    } else if (first === 'super') {
      crateId = use.crateId;
      modulePath = use.modulePath.slice(0, -1);
    } else {
      const lib = this.catalog.crates.find(c => c.kind === 'lib' && c.name === first);
      if (lib) {
        crateId = lib.idPrefix;
        modulePath = [];
      } else if (this.isLocalName(use, first)) {
        crateId = use.crateId;
        modulePath = [...use.modulePath, first];
      } else {
        return null;
      }
    }

    for (const segment of rest) {
      if (segment === 'super') modulePath.pop();
      else if (!PATH_KEYWORDS.has(segment)) modulePath.push(segment);
    }
    return { crateId, modulePath };
  }

  private isLocalName(use: UseItem, name: string): boolean {
    return this.catalog
      .freeItemsNamed(name)
      .some(c => c.crateId === use.crateId && sameModule(c.modulePath, use.modulePath));
  }

  /**
   * Whether a glob import brings `name` into scope: the glob targets a module
   * of a fused crate declaring or re-exporting `name`, or an enum or other
   * non-module item whose members are not cataloged
   */
  private globProvides(use: UseItem, path: string[], name: string, seen = new Set<ItemId>()): boolean {
    if (seen.has(use.id)) return false;
    seen.add(use.id);

    const target = this.resolveUsePath(use, path);
    if (!target) return false;
    const { crateId, modulePath } = target;

    const last = modulePath[modulePath.length - 1];
    if (last !== undefined) {
      const parent = modulePath.slice(0, -1);
      const owner = this.catalog
        .freeItemsNamed(last)
        .filter(c => c.crateId === crateId && sameModule(c.modulePath, parent));
      if (owner.length > 0 && owner.every(c => c.kind !== 'mod')) return true;
    }

    if (this.catalog.freeItemsNamed(name).some(c => c.crateId === crateId && sameModule(c.modulePath, modulePath))) {
      return true;
    }
    return this.catalog.usesIn(crateId, modulePath).some(reexport =>
      reexport.imports.some(i =>
        importedName(i) === name || (i.glob && this.globProvides(reexport, i.path, name, seen))
      )
    );
  }

  /**
   * Link a use declaration to the items its paths import, or to the use
   * declarations re-exporting them
   */
  private resolveUse(item: UseItem): void {
    for (const useImport of item.imports) {
      const target = useImport.path[useImport.path.length - 1];
      if (!target || PATH_KEYWORDS.has(target)) continue;
      const location = this.resolveUsePath(item, useImport.path.slice(0, -1));
      if (!location) continue;
      const { crateId, modulePath } = location;

      const candidates = this.catalog.freeItemsNamed(target).filter(c => c.crateId === crateId);
      const exact = candidates.filter(c => sameModule(c.modulePath, modulePath));
      const reexports = exact.length > 0
        ? []
        : this.catalog.usesIn(crateId, modulePath).filter(use =>
          use.id !== item.id &&
          use.imports.some(i => importedName(i) === target || (i.glob && this.globProvides(use, i.path, target)))
        );

      for (const reexport of reexports) {
        this.graph.addEdge(item.id, reexport.id, 'import');
      }
      if (reexports.length > 0) continue;
      for (const candidate of exact.length > 0 ? exact : candidates) {
        this.graph.addEdge(item.id, candidate.id, 'import');
      }
    }
  }
}

function sameModule(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

export function buildDependencyGraph(catalog: ItemCatalog): DependencyGraph {
  return new GraphBuilder(catalog).build();
}

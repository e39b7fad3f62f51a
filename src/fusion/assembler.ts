/**
 * Fusion assembler: orders the required items for emission
 */

import type { CatalogCrate, Item, ItemId } from '../types/index.js';
import type { ItemCatalog } from '../catalog/item-catalog.js';

export interface AssembledItem {
  item: Item;
  /** Required children of modules and impl blocks, in declaration order */
  children: AssembledItem[];
}

export interface AssembledCrate {
  crate: CatalogCrate;
  items: AssembledItem[];
}

/**
 * Required items as a forest per crate: the binary crate first, libraries in
 * input order, items in catalog order. Every identity appears once.
 */
export function assembleFusion(catalog: ItemCatalog, required: ReadonlySet<ItemId>): AssembledCrate[] {
  const seen = new Set<ItemId>();

  const build = (id: ItemId): AssembledItem | null => {
    const item = catalog.get(id);
    if (!item || !required.has(id) || seen.has(id)) return null;
    seen.add(id);

    const childIds = item.kind === 'mod' || item.kind === 'impl' ? item.children : [];
    return {
      item,
      children: childIds.flatMap(childId => {
        const child = build(childId);
        return child ? [child] : [];
      }),
    };
  };

  const crates = [
    ...catalog.crates.filter(c => c.kind === 'bin'),
    ...catalog.crates.filter(c => c.kind !== 'bin'),
  ];

  return crates
    .map(crate => ({
      crate,
      items: crate.items.flatMap(id => {
        const assembled = build(id);
        return assembled ? [assembled] : [];
      }),
    }))
    .filter(assembled => assembled.crate.kind === 'bin' || assembled.items.length > 0);
}

/**
 * Flattened identities in emission order
 */
export function assembledIds(crates: AssembledCrate[]): ItemId[] {
  const ids: ItemId[] = [];
  const visit = (assembled: AssembledItem) => {
    ids.push(assembled.item.id);
    assembled.children.forEach(visit);
  };
  for (const crate of crates) crate.items.forEach(visit);
  return ids;
}

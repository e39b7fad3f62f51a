/**
 * Dependency graph types
 */

import type { ItemId, Location, TextSpan } from './items.js';

export type ReferenceKind = 'call' | 'method' | 'type' | 'path' | 'macro' | 'value';

export interface ItemReference {
  name: string;
  kind: ReferenceKind;
  /** Preceding path segment of `Type::name`; `Self` is kept verbatim */
  qualifier: string | null;
  /** True when the name is the first segment of a multi-segment path */
  pathRoot: boolean;
  span: TextSpan;
  location: Location;
}

export type EdgeKind = 'reference' | 'import' | 'parent' | 'owner' | 'atomic';

export interface DependencyEdge {
  from: ItemId;
  to: ItemId;
  kind: EdgeKind;
  reference: ItemReference | null;
}

export interface AmbiguousEdge {
  from: ItemId;
  name: string;
  qualifier: string | null;
  candidates: ItemId[];
  reference: ItemReference;
}

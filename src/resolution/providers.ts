/**
 * Resolution providers decide impl items neither the graph nor the
 * configuration settles
 */

import type { ImplBlock, ImplDecision, ImplItem, Item, ItemReference } from '../types/index.js';

export interface ItemUsage {
  item: Item;
  reference: ItemReference | null;
}

export interface PendingItemContext {
  item: ImplItem;
  block: ImplBlock;
  /** Required items referencing the pending item by name */
  usages: ItemUsage[];
  /** Position of the item in the pending queue, starting at 1 */
  position: number;
  remaining: number;
}

export interface PendingDecision {
  decision: ImplDecision;
  /** `block` applies the decision to every undecided item of the block */
  scope: 'item' | 'block';
}

export interface ResolutionProvider {
  readonly interactive: boolean;

  /**
   * Decide a pending impl item; `null` leaves it unresolved
   */
  decide(context: PendingItemContext): Promise<PendingDecision | null>;

  /**
   * Pick the block an unqualified configuration pattern means; `null` leaves it ambiguous
   */
  chooseBlock(pattern: string, candidates: ImplBlock[]): Promise<ImplBlock | null>;
}

/**
 * Non-interactive provider: anything not settled by configuration stays unresolved
 */
export class BatchResolutionProvider implements ResolutionProvider {
  readonly interactive = false;

  async decide(): Promise<PendingDecision | null> {
    return null;
  }

  async chooseBlock(): Promise<ImplBlock | null> {
    return null;
  }
}

/**
 * Impl item dialog: the operator decides impl items the configuration does not cover
 */

import type { ImplBlock, Item } from '../types/index.js';
import { OperatorCancelledError } from '../errors.js';
import type { PendingDecision, PendingItemContext, ResolutionProvider } from '../resolution/providers.js';
import type { DialogIO } from './dialog-io.js';

const ITEM_OPTIONS = [
  'Include item',
  'Exclude item',
  'Include all items of impl block',
  'Exclude all items of impl block',
  'Show code of item',
  'Show usage of item',
] as const;

const DECISIONS: Record<number, PendingDecision> = {
  0: { decision: 'include', scope: 'item' },
  1: { decision: 'exclude', scope: 'item' },
  2: { decision: 'include', scope: 'block' },
  3: { decision: 'exclude', scope: 'block' },
};

function locationOf(item: Item): string {
  return `${item.location.filePath}:${item.location.line}:${item.location.column}`;
}

export function formatItemCode(item: Item): string {
  return `${locationOf(item)}\n${item.source.content.slice(item.span.start, item.span.end)}`;
}

export function formatItemUsage(context: PendingItemContext): string {
  if (context.usages.length === 0) {
    return `'${context.item.name}' is not referenced by name; it was queued because its impl block is configured.`;
  }

  return context.usages
    .map(({ item, reference }) => {
      if (!reference) return locationOf(item);
      const lines = item.source.content.split('\n');
      const line = lines[reference.location.line - 1] ?? '';
      return `${reference.location.filePath}:${reference.location.line}:${reference.location.column}\n    ${line.trim()}`;
    })
    .join('\n');
}

export class DialogResolutionProvider implements ResolutionProvider {
  readonly interactive = true;

  constructor(private readonly io: DialogIO) {}

  async decide(context: PendingItemContext): Promise<PendingDecision> {
    const { item, block } = context;
    const total = context.position + context.remaining;

    for (;;) {
      const index = await this.io.select(
        `Found '${item.name}' of required '${block.qualifiedName}'.`,
        `(${context.position}/${total}) How do you want to proceed?`,
        [...ITEM_OPTIONS]
      );
      if (index === null) {
        throw new OperatorCancelledError();
      }

      const decision = DECISIONS[index];
      if (decision) return decision;

      this.io.write(index === 4 ? formatItemCode(item) : formatItemUsage(context));
    }
  }

  async chooseBlock(pattern: string, candidates: ImplBlock[]): Promise<ImplBlock> {
    const index = await this.io.select(
      `'${pattern}' names items of ${candidates.length} impl blocks.`,
      'Which impl block does this configuration entry mean?',
      candidates.map(block => `${block.qualifiedName}  (${locationOf(block)})`)
    );
    const chosen = index === null ? undefined : candidates[index];
    if (!chosen) {
      throw new OperatorCancelledError();
    }
    return chosen;
  }
}

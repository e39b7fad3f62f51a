/**
 * Maps configured impl patterns onto catalog items
 */

import type { Diagnostic, ImplBlock, ImplDecision, ImplItem, ItemId } from '../types/index.js';
import type { Config } from '../config/schema.js';
import type { ItemCatalog } from '../catalog/item-catalog.js';
import { AmbiguousImplItemReferenceError, type Ambiguity } from '../errors.js';
import { formatImplItemPattern, parseImplBlockPattern, parseImplItemPattern, type ImplItemPattern } from './patterns.js';
import type { ResolutionProvider } from './providers.js';

export interface RecordedDecision {
  pattern: string;
  decision: ImplDecision;
  /** Configured pattern this one supersedes */
  replaces?: string;
}

export interface ConfigTargets {
  items: Map<ItemId, ImplDecision>;
  blocks: Map<ItemId, ImplDecision>;
  /** Ambiguous patterns the operator qualified */
  rewrites: RecordedDecision[];
  diagnostics: Diagnostic[];
}

interface PatternList {
  decision: ImplDecision;
  origin: string;
  patterns: string[];
}

export class ConfigTargetResolver {
  private items = new Map<ItemId, ImplDecision>();
  private blocks = new Map<ItemId, ImplDecision>();
  private rewrites: RecordedDecision[] = [];
  private diagnostics: Diagnostic[] = [];
  private ambiguities: Ambiguity[] = [];

  constructor(
    private readonly catalog: ItemCatalog,
    private readonly provider: ResolutionProvider
  ) {}

  /**
   * Resolve every configured pattern. Excludes are applied first so includes win.
   * Fails with all unqualified ambiguous patterns at once.
   */
  async resolve(config: Config): Promise<ConfigTargets> {
    const itemLists: PatternList[] = [
      { decision: 'exclude', origin: 'impl_items.exclude', patterns: config.impl_items.exclude },
      { decision: 'include', origin: 'impl_items.include', patterns: config.impl_items.include },
    ];
    const blockLists: PatternList[] = [
      { decision: 'exclude', origin: 'impl_blocks.exclude', patterns: config.impl_blocks.exclude },
      { decision: 'include', origin: 'impl_blocks.include', patterns: config.impl_blocks.include },
    ];

    // parse everything up front so malformed patterns fail before any dialog
    const parsedItems = itemLists.map(list => ({ ...list, parsed: list.patterns.map(parseImplItemPattern) }));
    const parsedBlocks = blockLists.map(list => ({ ...list, parsed: list.patterns.map(parseImplBlockPattern) }));

    for (const list of parsedBlocks) {
      for (const [index, name] of list.parsed.entries()) {
        const blocks = this.blocksNamed(name);
        if (blocks.length === 0) {
          this.unknownTarget(list.origin, list.patterns[index] ?? name);
        }
        for (const block of blocks) {
          this.blocks.set(block.id, list.decision);
        }
      }
    }

    for (const list of parsedItems) {
      for (const pattern of list.parsed) {
        const targets = await this.itemTargets(pattern, list);
        for (const item of targets) {
          this.items.set(item.id, list.decision);
        }
      }
    }

    if (this.ambiguities.length > 0) {
      throw new AmbiguousImplItemReferenceError(this.ambiguities);
    }

    return {
      items: this.items,
      blocks: this.blocks,
      rewrites: this.rewrites,
      diagnostics: this.diagnostics,
    };
  }

  private blocksNamed(name: string): ImplBlock[] {
    return this.catalog.implBlocks().filter(block => block.qualifiedName === name);
  }

  private async itemTargets(pattern: ImplItemPattern, list: PatternList): Promise<ImplItem[]> {
    switch (pattern.kind) {
      case 'wildcard': {
        const blocks = this.blocksNamed(pattern.block);
        const items = blocks.flatMap(block => this.catalog.childrenOf(block.id))
          .filter((item): item is ImplItem => item.kind === 'impl_item');
        if (blocks.length === 0) this.unknownTarget(list.origin, pattern.raw);
        return items;
      }
      case 'qualified': {
        const items = this.catalog
          .implItemsNamed(pattern.name)
          .filter(item => this.catalog.blockOf(item).qualifiedName === pattern.block);
        if (items.length === 0) this.unknownTarget(list.origin, pattern.raw);
        return items;
      }
      case 'plain': {
        const items = this.catalog.implItemsNamed(pattern.name);
        if (items.length === 0) {
          this.unknownTarget(list.origin, pattern.raw);
          return [];
        }

        const blocks = distinctBlocks(items.map(item => this.catalog.blockOf(item)));
        const [onlyBlock] = blocks;
        if (blocks.length === 1 && onlyBlock) {
          return items;
        }

        const chosen = await this.provider.chooseBlock(pattern.raw, blocks);
        if (!chosen) {
          this.ambiguities.push({
            name: pattern.name,
            origin: list.origin,
            candidateBlocks: blocks.map(block => block.qualifiedName),
          });
          return [];
        }

        const qualified = formatImplItemPattern({
          kind: 'qualified',
          name: pattern.name,
          block: chosen.qualifiedName,
          raw: pattern.raw,
        });
        this.rewrites.push({ pattern: qualified, decision: list.decision, replaces: pattern.raw });
        this.diagnostics.push({
          severity: 'info',
          code: 'OperatorDecision',
          message: `'${pattern.raw}' (${list.origin}) qualified as '${qualified}'`,
        });
        return items.filter(item => item.blockId === chosen.id);
      }
    }
  }

  private unknownTarget(origin: string, raw: string): void {
    this.diagnostics.push({
      severity: 'warning',
      code: 'UnknownConfigTarget',
      message: `${origin} entry '${raw}' matches nothing in the crates`,
    });
  }
}

function distinctBlocks(blocks: ImplBlock[]): ImplBlock[] {
  const seen = new Set<ItemId>();
  return blocks.filter(block => {
    if (seen.has(block.id)) return false;
    seen.add(block.id);
    return true;
  });
}

/**
 * Impl resolution and conflict policy.
 *
 * Drives reachability from the entry points and configured includes, settles
 * ambiguous impl item references and repeats until nothing is pending.
 * Precedence for a pending impl item:
 *   1. impl_items include/exclude (include wins)
 *   2. impl_blocks include/exclude of its block
 *   3. trait impl blocks default to excluded, with a warning
 *   4. fusion.default_impl_items
 *   5. the resolution provider (operator dialog); batch mode fails instead
 */

import type {
  AmbiguousEdge,
  Diagnostic,
  ImplBlock,
  ImplDecision,
  ImplItem,
  ItemId,
  ResolutionState,
} from '../types/index.js';
import { isTraitImpl } from '../types/index.js';
import type { Config } from '../config/schema.js';
import type { ItemCatalog } from '../catalog/item-catalog.js';
import { itemIdentity } from '../catalog/item-catalog.js';
import type { DependencyGraph } from '../analysis/dependency-graph.js';
import { ReachabilityAnalyzer } from '../analysis/reachability.js';
import { AmbiguousImplItemReferenceError, EntryPointNotFoundError, type Ambiguity } from '../errors.js';
import { ConfigTargetResolver, type ConfigTargets, type RecordedDecision } from './config-targets.js';
import { BatchResolutionProvider, type ItemUsage, type ResolutionProvider } from './providers.js';

export interface ResolveOptions {
  /** Additional entry points besides the binary crate's `main` */
  entryPoints?: ItemId[];
  provider?: ResolutionProvider;
}

export interface ResolutionResult {
  states: Map<ItemId, ResolutionState>;
  required: Set<ItemId>;
  diagnostics: Diagnostic[];
  /** Decisions taken by the operator, in configuration pattern form */
  operatorDecisions: RecordedDecision[];
}

export const MAIN_ENTRY_POINT = itemIdentity('crate', [], 'fn', 'main');

export class PolicyEngine {
  private analyzer: ReachabilityAnalyzer;
  private provider: ResolutionProvider;
  private diagnostics: Diagnostic[] = [];
  private operatorDecisions: RecordedDecision[] = [];
  /** Impl items decided as excluded; reachability may still force them in */
  private excluded = new Set<ItemId>();
  private pending: ItemId[] = [];
  private pendingSet = new Set<ItemId>();
  private warnedBlocks = new Set<ItemId>();
  private targets: ConfigTargets = {
    items: new Map(),
    blocks: new Map(),
    rewrites: [],
    diagnostics: [],
  };

  constructor(
    private readonly catalog: ItemCatalog,
    private readonly graph: DependencyGraph,
    private readonly config: Config,
    private readonly options: ResolveOptions = {}
  ) {
    this.analyzer = new ReachabilityAnalyzer(graph);
    this.provider = options.provider ?? new BatchResolutionProvider();
  }

  async resolve(): Promise<ResolutionResult> {
    const entryPoints = this.entryPoints();

    this.targets = await new ConfigTargetResolver(this.catalog, this.provider).resolve(this.config);
    this.diagnostics.push(...this.targets.diagnostics);
    this.operatorDecisions.push(...this.targets.rewrites);

    this.require(entryPoints);
    this.require(this.configuredSeeds());
    this.queueIncludedTraitFreeBlocks();

    for (;;) {
      const edges = this.analyzer.takeAmbiguous();
      if (edges.length > 0) {
        this.settleAmbiguousEdges(edges);
        continue;
      }
      if (this.pending.length === 0) break;
      await this.resolvePending();
    }

    return this.result();
  }

  private entryPoints(): ItemId[] {
    const main = this.catalog.get(MAIN_ENTRY_POINT);
    if (!main || main.kind !== 'fn') {
      throw new EntryPointNotFoundError('main');
    }

    const entryPoints = [main.id];
    for (const id of this.options.entryPoints ?? []) {
      if (!this.catalog.has(id)) {
        throw new EntryPointNotFoundError(id);
      }
      entryPoints.push(id);
    }
    return entryPoints;
  }

  /**
   * Included impl items and included trait impl blocks
   */
  private configuredSeeds(): ItemId[] {
    const seeds: ItemId[] = [];
    for (const [id, decision] of this.targets.items) {
      if (decision === 'include') seeds.push(id);
    }
    for (const [id, decision] of this.targets.blocks) {
      const block = this.catalog.get(id);
      if (decision === 'include' && block?.kind === 'impl' && isTraitImpl(block)) {
        seeds.push(id);
      }
    }
    return seeds;
  }

  /**
   * Items of included blocks without a trait are offered one by one
   */
  private queueIncludedTraitFreeBlocks(): void {
    for (const [id, decision] of this.targets.blocks) {
      const block = this.catalog.get(id);
      if (decision !== 'include' || block?.kind !== 'impl' || isTraitImpl(block)) continue;

      this.require([block.id]);
      for (const child of this.catalog.childrenOf(block.id)) {
        if (child.kind === 'impl_item') this.addPending(child.id);
      }
    }
  }

  private require(ids: ItemId[]): void {
    for (const id of this.analyzer.extend(ids)) {
      const item = this.catalog.get(id);
      if (!item) continue;

      const block = this.catalog.enclosingBlock(item);
      const excludedBy =
        this.targets.items.get(id) === 'exclude' ? 'impl_items.exclude'
        : this.excluded.has(id) ? 'an earlier decision'
        : block && this.targets.blocks.get(block.id) === 'exclude' && this.targets.items.get(id) !== 'include' ? 'impl_blocks.exclude'
        : null;

      if (excludedBy && item.kind !== 'impl') {
        this.diagnostics.push({
          severity: 'info',
          code: 'ForcedInclusion',
          message: `'${itemLabel(this.catalog, id)}' is required by the program and included despite ${excludedBy}`,
          itemId: id,
        });
      }
    }
  }

  /**
   * Qualified references (`Type::name`, `Self::name`) settle themselves when the
   * qualifier names the type of some candidate blocks; the rest become pending
   */
  private settleAmbiguousEdges(edges: AmbiguousEdge[]): void {
    for (const edge of edges) {
      const candidates = edge.candidates.flatMap(id => {
        const item = this.catalog.get(id);
        return item?.kind === 'impl_item' ? [item] : [];
      });

      const typeName = this.qualifierType(edge);
      const matched = typeName
        ? candidates.filter(candidate => this.catalog.blockOf(candidate).selfTypeName === typeName)
        : [];

      if (matched.length > 0) {
        const fresh = matched.filter(item => !this.analyzer.isRequired(item.id));
        if (fresh.length > 0) {
          this.diagnostics.push({
            severity: 'info',
            code: 'AutoQualified',
            message: `'${edge.qualifier ?? ''}::${edge.name}' in '${itemLabel(this.catalog, edge.from)}' resolved to ${fresh
              .map(item => `'${item.name}@${this.catalog.blockOf(item).qualifiedName}'`)
              .join(', ')}`,
            itemId: edge.from,
          });
          this.require(fresh.map(item => item.id));
        }
        continue;
      }

      for (const candidate of candidates) {
        this.addPending(candidate.id);
      }
    }
  }

  private qualifierType(edge: AmbiguousEdge): string | null {
    if (!edge.qualifier) return null;
    if (edge.qualifier !== 'Self') return edge.qualifier;
    const from = this.catalog.get(edge.from);
    const block = from ? this.catalog.enclosingBlock(from) : null;
    return block ? block.selfTypeName : null;
  }

  private addPending(id: ItemId): void {
    if (this.pendingSet.has(id) || this.analyzer.isRequired(id) || this.excluded.has(id)) return;
    this.pendingSet.add(id);
    this.pending.push(id);
  }

  /**
   * Decide the queued items one at a time; an include is followed immediately,
   * which may settle later items of the queue
   */
  private async resolvePending(): Promise<void> {
    const queue = this.pending;
    this.pending = [];
    const unresolved: ImplItem[] = [];

    for (const [index, id] of queue.entries()) {
      const item = this.catalog.get(id);
      if (!item || item.kind !== 'impl_item') continue;
      if (this.analyzer.isRequired(id) || this.excluded.has(id)) continue;

      const block = this.catalog.blockOf(item);
      const decided = this.decideFromPolicy(item, block);
      if (decided) {
        this.apply(item, decided);
        continue;
      }

      const choice = await this.provider.decide({
        item,
        block,
        usages: this.usagesOf(item.id),
        position: index + 1,
        remaining: queue.length - index - 1,
      });
      if (!choice) {
        unresolved.push(item);
        continue;
      }

      const affected = choice.scope === 'block'
        ? this.catalog.childrenOf(block.id).flatMap(child =>
          child.kind === 'impl_item' && !this.analyzer.isRequired(child.id) && !this.excluded.has(child.id) ? [child] : []
        )
        : [item];
      for (const target of affected) {
        this.apply(target, choice.decision);
      }
      this.operatorDecisions.push({
        pattern: choice.scope === 'block' ? `*@${block.qualifiedName}` : this.itemPattern(item, block),
        decision: choice.decision,
      });
      this.diagnostics.push({
        severity: 'info',
        code: 'OperatorDecision',
        message: `${choice.decision === 'include' ? 'Including' : 'Excluding'} ${
          choice.scope === 'block' ? `all items of '${block.qualifiedName}'` : `impl item '${this.itemPattern(item, block)}'`
        }`,
        itemId: item.id,
      });
    }

    if (unresolved.length > 0) {
      throw new AmbiguousImplItemReferenceError(this.unresolvedAmbiguities(unresolved));
    }
  }

  private decideFromPolicy(item: ImplItem, block: ImplBlock): ImplDecision | null {
    const configured = this.targets.items.get(item.id) ?? this.targets.blocks.get(block.id);
    if (configured && !(configured === 'include' && !isTraitImpl(block) && !this.targets.items.has(item.id))) {
      this.diagnostics.push({
        severity: 'info',
        code: 'ConfigDecision',
        message: `${configured === 'include' ? 'Including' : 'Excluding'} impl item '${this.itemPattern(item, block)}' by configuration`,
        itemId: item.id,
      });
      return configured;
    }

    if (isTraitImpl(block)) {
      if (!this.warnedBlocks.has(block.id)) {
        this.warnedBlocks.add(block.id);
        this.diagnostics.push({
          severity: 'warning',
          code: 'UnresolvedTraitImpl',
          message: `Excluding '${block.qualifiedName}': trait impls referenced only by name cannot be resolved automatically; add it to impl_blocks.include if the program needs it`,
          itemId: block.id,
        });
      }
      return 'exclude';
    }

    const fallback = this.config.fusion.default_impl_items;
    if (fallback) {
      this.diagnostics.push({
        severity: 'info',
        code: 'DefaultImplItems',
        message: `${fallback === 'include' ? 'Including' : 'Excluding'} impl item '${this.itemPattern(item, block)}' by default`,
        itemId: item.id,
      });
      return fallback;
    }

    return null;
  }

  private apply(item: ImplItem, decision: ImplDecision): void {
    if (decision === 'include') {
      this.require([item.id]);
    } else {
      this.excluded.add(item.id);
    }
  }

  private usagesOf(id: ItemId): ItemUsage[] {
    return this.graph.referrersOf(id).flatMap(({ from, reference }) => {
      const item = this.catalog.get(from);
      return item && this.analyzer.isRequired(from) ? [{ item, reference }] : [];
    });
  }

  /**
   * Plain name when no other block has an item of that name
   */
  private itemPattern(item: ImplItem, block: ImplBlock): string {
    const blocks = new Set(this.catalog.implItemsNamed(item.name).map(other => other.blockId));
    return blocks.size > 1 ? `${item.name}@${block.qualifiedName}` : item.name;
  }

  private unresolvedAmbiguities(items: ImplItem[]): Ambiguity[] {
    const byName = new Map<string, Ambiguity>();
    for (const item of items) {
      const usage = this.usagesOf(item.id)[0];
      const entry = byName.get(item.name) ?? {
        name: item.name,
        origin: usage ? `referenced by ${itemLabel(this.catalog, usage.item.id)}` : 'included impl block',
        candidateBlocks: [],
      };
      const blockName = this.catalog.blockOf(item).qualifiedName;
      if (!entry.candidateBlocks.includes(blockName)) entry.candidateBlocks.push(blockName);
      byName.set(item.name, entry);
    }
    return Array.from(byName.values());
  }

  private result(): ResolutionResult {
    const required = new Set(this.analyzer.requiredIds);
    const states = new Map<ItemId, ResolutionState>();
    for (const item of this.catalog.all()) {
      states.set(item.id, required.has(item.id) ? 'Required' : 'Excluded');
    }
    return {
      states,
      required,
      diagnostics: this.diagnostics,
      operatorDecisions: this.operatorDecisions,
    };
  }
}

function itemLabel(catalog: ItemCatalog, id: ItemId): string {
  const item = catalog.get(id);
  if (!item) return id;
  if (item.kind === 'impl_item') return `${item.name}@${catalog.blockOf(item).qualifiedName}`;
  return [item.crate, ...item.modulePath, item.name].join('::');
}

export async function resolveImpls(
  catalog: ItemCatalog,
  graph: DependencyGraph,
  config: Config,
  options: ResolveOptions = {}
): Promise<ResolutionResult> {
  return new PolicyEngine(catalog, graph, config, options).resolve();
}

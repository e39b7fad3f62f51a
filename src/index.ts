/**
 * crate-fusion - fuse a Rust challenge and its local library crates into one file
 *
 * The pipeline loads every crate, catalogs its items, builds the dependency
 * graph, settles which impl items are needed and emits the required items
 * with the libraries inlined as modules.
 */

// Types
export * from './types/index.js';
export * from './errors.js';

// Parsing and loading
export { RustParser, getDefaultParser, resetParser } from './parsers/rust.js';
export type { ParseResult, ParseError, ParserOptions, ModuleDeclaration } from './parsers/base.js';
export { loadCrate, loadCrates, normalizeCrateName, type CrateSource, type LoadedCrate } from './crates/loader.js';
export { readManifest, resolveChallengeCrates, type CrateManifest } from './crates/manifest.js';

// Catalog and analysis
export { ItemCatalog, itemIdentity, type CatalogOptions } from './catalog/item-catalog.js';
export { canonicalBlockName, formatQualifiedBlockName, parseQualifiedBlockName } from './catalog/qualified-name.js';
export { extractReferences } from './analysis/reference-extractor.js';
export { DependencyGraph, buildDependencyGraph } from './analysis/dependency-graph.js';
export { ReachabilityAnalyzer, computeReachability, type ReachabilityResult } from './analysis/reachability.js';

// Impl resolution
export { parseImplItemPattern, formatImplItemPattern, type ImplItemPattern } from './resolution/patterns.js';
export { BatchResolutionProvider, type ResolutionProvider, type PendingItemContext, type PendingDecision } from './resolution/providers.js';
export { type RecordedDecision } from './resolution/config-targets.js';
export { PolicyEngine, resolveImpls, MAIN_ENTRY_POINT, type ResolutionResult, type ResolveOptions } from './resolution/policy-engine.js';

// Dialog
export { DialogResolutionProvider } from './dialog/impl-dialog.js';
export { ReadlineDialog } from './dialog/readline-dialog.js';
export { runSaveDialog } from './dialog/save-dialog.js';
export type { DialogIO } from './dialog/dialog-io.js';

// Fusion
export { assembleFusion, type AssembledCrate, type AssembledItem } from './fusion/assembler.js';
export { emitFusion } from './fusion/emitter.js';
export { fuseCrates, resolveCrateSources, defaultOutputPath, type FuseOptions, type FuseResult } from './fusion/pipeline.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  mergeImplOptions,
  applyDecisions,
  writeConfig,
  type Config,
} from './config/index.js';

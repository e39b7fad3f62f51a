/**
 * Error types raised by the fusion pipeline
 */

import type { Location } from './types/index.js';

export const FusionErrorCode = {
  UNSUPPORTED_ITEM_KIND: 'UnsupportedItemKind',
  DUPLICATE_ITEM_IDENTITY: 'DuplicateItemIdentity',
  AMBIGUOUS_IMPL_ITEM_REFERENCE: 'AmbiguousImplItemReference',
  OPERATOR_CANCELLED: 'OperatorCancelled',
  INVALID_CONFIG_PATTERN: 'InvalidConfigPattern',
  ENTRY_POINT_NOT_FOUND: 'EntryPointNotFound',
  MODULE_NOT_FOUND: 'ModuleNotFound',
  INVALID_CONFIG_FILE: 'InvalidConfigFile',
} as const;

export type FusionErrorCode = (typeof FusionErrorCode)[keyof typeof FusionErrorCode];

export class FusionError extends Error {
  constructor(
    message: string,
    public readonly code: FusionErrorCode
  ) {
    super(message);
    this.name = 'FusionError';
  }
}

function formatLocation(location: Location): string {
  return `${location.filePath}:${location.line}:${location.column}`;
}

export class UnsupportedItemKindError extends FusionError {
  constructor(
    public readonly kind: string,
    public readonly location: Location
  ) {
    super(`Unsupported item kind '${kind}' at ${formatLocation(location)}`, FusionErrorCode.UNSUPPORTED_ITEM_KIND);
    this.name = 'UnsupportedItemKindError';
  }
}

export class DuplicateItemIdentityError extends FusionError {
  constructor(
    public readonly identity: string,
    public readonly locations: Location[]
  ) {
    super(
      `Duplicate item identity '${identity}' (${locations.map(formatLocation).join(', ')})`,
      FusionErrorCode.DUPLICATE_ITEM_IDENTITY
    );
    this.name = 'DuplicateItemIdentityError';
  }
}

export interface Ambiguity {
  /** Plain item name or configuration pattern that could not be resolved */
  name: string;
  /** Where the ambiguous name came from, e.g. `impl_items.include` or an item identity */
  origin: string;
  /** Fully qualified names of the candidate impl blocks */
  candidateBlocks: string[];
}

export class AmbiguousImplItemReferenceError extends FusionError {
  constructor(public readonly ambiguities: Ambiguity[]) {
    const lines = ambiguities.map(a =>
      `  - '${a.name}' (${a.origin}) matches items of: ${a.candidateBlocks.map(b => `'${b}'`).join(', ')}`
    );
    super(
      `Ambiguous impl item reference(s); qualify with 'name@<impl block>' or configure a decision:\n${lines.join('\n')}`,
      FusionErrorCode.AMBIGUOUS_IMPL_ITEM_REFERENCE
    );
    this.name = 'AmbiguousImplItemReferenceError';
  }
}

export class OperatorCancelledError extends FusionError {
  constructor() {
    super('Impl item dialog cancelled by user; no output was written.', FusionErrorCode.OPERATOR_CANCELLED);
    this.name = 'OperatorCancelledError';
  }
}

export class InvalidConfigPatternError extends FusionError {
  constructor(
    public readonly pattern: string,
    public readonly reason: string
  ) {
    super(`Invalid impl config option '${pattern}': ${reason}`, FusionErrorCode.INVALID_CONFIG_PATTERN);
    this.name = 'InvalidConfigPatternError';
  }
}

export class EntryPointNotFoundError extends FusionError {
  constructor(public readonly entryPoint: string) {
    super(`Entry point '${entryPoint}' not found in catalog`, FusionErrorCode.ENTRY_POINT_NOT_FOUND);
    this.name = 'EntryPointNotFoundError';
  }
}

export class ModuleNotFoundError extends FusionError {
  constructor(
    public readonly moduleName: string,
    public readonly candidates: string[]
  ) {
    super(
      `Module file for '${moduleName}' not found (looked for ${candidates.join(', ')})`,
      FusionErrorCode.MODULE_NOT_FOUND
    );
    this.name = 'ModuleNotFoundError';
  }
}

export class ConfigFileError extends FusionError {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message, FusionErrorCode.INVALID_CONFIG_FILE);
    this.name = 'ConfigFileError';
  }
}

/**
 * Resolution state and diagnostics
 */

import type { ItemId } from './items.js';

export type ResolutionState = 'Required' | 'Excluded' | 'Pending';

export type ImplDecision = 'include' | 'exclude';

export type DiagnosticCode =
  | 'UnresolvedTraitImpl'
  | 'ForcedInclusion'
  | 'UnknownConfigTarget'
  | 'ConfigDecision'
  | 'AutoQualified'
  | 'DefaultImplItems'
  | 'OperatorDecision';

export interface Diagnostic {
  severity: 'info' | 'warning';
  code: DiagnosticCode;
  message: string;
  itemId?: ItemId;
}

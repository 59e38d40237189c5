export { reconcile, applyEnforcement, lookup, parseWith, expectBody } from './reconcile.js';
export { exactMatch, containsMatch, firstMatch, preferMatch, findMatch } from './match.js';
export type { MatchPolicy } from './match.js';
export type {
  Enforcement,
  Reconciled,
  ReconcileOptions,
  ReconcileResult,
  ReconcileStatus,
  ResourceHandle,
  Schema,
} from './types.js';

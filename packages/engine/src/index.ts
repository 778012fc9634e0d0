/**
 * Reconciliation engine - Export all public APIs
 */

// Fingerprints
export {
  FINGERPRINT_VERSION,
  canonicalize,
  fingerprintSteps,
  fingerprintAnswers,
  fingerprintOptions,
  isFingerprint,
} from './fingerprint';

// Diff Engine
export { decide, planReconciliation, summarizePlan, isConverged } from './diff';
export type { Operation, OperationKind, RecreateReason, ReconciliationPlan } from './diff';

// Reconciler
export { Reconciler, DEFAULT_CONCURRENCY } from './reconciler';
export type { ReconcilerConfig, RunOptions } from './reconciler';

// Report
export { summarizeReport, hasErrors, failedEntries } from './report';
export type { Outcome, ReportEntry, ReconciliationReport, ReportSummary } from './report';

// Concurrency helpers
export { KeyedLock } from './keyed-lock';
export { withTimeout } from './timeout';

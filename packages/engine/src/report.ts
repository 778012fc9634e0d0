/**
 * Reconciliation Report types.
 *
 * The report is the only externally observable result of a pass; logging and
 * alerting collaborators consume it.
 */

import type { ClassifiedError, ErrorType } from "@converge/proto";
import type { OperationKind, ReconciliationPlan } from "./diff";

export type Outcome = "success" | "skipped" | "error";

export interface ReportEntry {
  configurationId: string;
  operation: OperationKind;
  outcome: Outcome;
  /** Human-readable detail; the error message verbatim for errors */
  detail?: string;
  /** Classification of the failure when outcome is "error" */
  errorType?: ErrorType;
  error?: ClassifiedError;
}

export interface ReconciliationReport {
  /** Plan the pass executed */
  plan: ReconciliationPlan;
  /** One entry per operation in plan order, plus an entry for a failed or skipped options sub-step */
  entries: ReportEntry[];
  /** Whether the pass was cancelled before every operation started */
  cancelled: boolean;
  startedAt: number;
  finishedAt: number;
}

export interface ReportSummary {
  success: number;
  skipped: number;
  error: number;
}

export function summarizeReport(report: ReconciliationReport): ReportSummary {
  const summary: ReportSummary = { success: 0, skipped: 0, error: 0 };
  for (const entry of report.entries) {
    summary[entry.outcome]++;
  }
  return summary;
}

export function hasErrors(report: ReconciliationReport): boolean {
  return report.entries.some((entry) => entry.outcome === "error");
}

/**
 * Entries with outcome "error", in report order.
 */
export function failedEntries(report: ReconciliationReport): ReportEntry[] {
  return report.entries.filter((entry) => entry.outcome === "error");
}

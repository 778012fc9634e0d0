/**
 * Diff Engine
 *
 * Pure comparison of desired items against stored records. Never throws:
 * records it cannot make sense of compare as changed, which degrades to the
 * safest operation (recreate).
 */

import type { DesiredItem, Options, StoredRecord, StoredState } from "@converge/proto";
import { fingerprintAnswers, fingerprintOptions, isFingerprint } from "./fingerprint";

/** Why a stored instance has to be replaced */
export type RecreateReason = "platform" | "answers" | "options";

export type Operation =
  | { kind: "delete"; configurationId: string }
  | { kind: "create"; configurationId: string; item: DesiredItem }
  | { kind: "recreate"; configurationId: string; item: DesiredItem; reason: RecreateReason }
  | { kind: "update-options"; configurationId: string; options: Options }
  | { kind: "noop"; configurationId: string };

export type OperationKind = Operation["kind"];

/**
 * Ordered operations computed from one snapshot. Deletes come first (stored
 * iteration order), then one operation per desired item (desired order).
 */
export type ReconciliationPlan = ReadonlyArray<Operation>;

/**
 * Decide the operation for one desired item given its stored record.
 */
export function decide(item: DesiredItem, record: StoredRecord | undefined): Operation {
  const configurationId = item.configurationId;

  if (!record) {
    return { kind: "create", configurationId, item };
  }

  // The stored instance cannot be reinterpreted under another connector type
  if (record.platform !== item.platform) {
    return { kind: "recreate", configurationId, item, reason: "platform" };
  }

  if (
    !isFingerprint(record.answersFingerprint) ||
    record.answersFingerprint !== fingerprintAnswers(item.answers)
  ) {
    return { kind: "recreate", configurationId, item, reason: "answers" };
  }

  const optionsChanged =
    !isFingerprint(record.optionsFingerprint) ||
    record.optionsFingerprint !== fingerprintOptions(item.options);

  if (optionsChanged) {
    return item.recreateOnOptionsChange
      ? { kind: "recreate", configurationId, item, reason: "options" }
      : { kind: "update-options", configurationId, options: item.options };
  }

  return { kind: "noop", configurationId };
}

/**
 * Compute the reconciliation plan.
 *
 * A configurationId repeated inside `desired` keeps its first occurrence.
 */
export function planReconciliation(
  desired: ReadonlyArray<DesiredItem>,
  stored: StoredState
): ReconciliationPlan {
  const wanted = new Map<string, DesiredItem>();
  for (const item of desired) {
    if (!wanted.has(item.configurationId)) {
      wanted.set(item.configurationId, item);
    }
  }

  const operations: Operation[] = [];

  for (const configurationId of stored.keys()) {
    if (!wanted.has(configurationId)) {
      operations.push({ kind: "delete", configurationId });
    }
  }

  for (const item of wanted.values()) {
    operations.push(decide(item, stored.get(item.configurationId)));
  }

  return operations;
}

/**
 * Count operations per kind.
 */
export function summarizePlan(plan: ReconciliationPlan): Record<OperationKind, number> {
  const summary: Record<OperationKind, number> = {
    delete: 0,
    create: 0,
    recreate: 0,
    "update-options": 0,
    noop: 0,
  };
  for (const op of plan) {
    summary[op.kind]++;
  }
  return summary;
}

/**
 * True when applying the plan would change nothing.
 */
export function isConverged(plan: ReconciliationPlan): boolean {
  return plan.every((op) => op.kind === "noop");
}

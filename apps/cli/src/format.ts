import type { StoredState } from '@converge/proto';
import {
  summarizePlan,
  summarizeReport,
  type Operation,
  type ReconciliationPlan,
  type ReconciliationReport,
  type ReportEntry,
} from '@converge/engine';

const OPERATION_MARKS: Record<Operation['kind'], string> = {
  create: '+',
  delete: '-',
  recreate: '±',
  'update-options': '~',
  noop: '=',
};

export function formatOperation(op: Operation): string {
  const mark = OPERATION_MARKS[op.kind];
  switch (op.kind) {
    case 'create':
      return `${mark} create ${op.configurationId} (${op.item.platform})`;
    case 'recreate':
      return `${mark} recreate ${op.configurationId} (${op.item.platform}, ${op.reason} changed)`;
    case 'update-options':
      return `${mark} update-options ${op.configurationId}`;
    case 'delete':
      return `${mark} delete ${op.configurationId}`;
    case 'noop':
      return `${mark} unchanged ${op.configurationId}`;
  }
}

export function formatPlanSummary(plan: ReconciliationPlan): string {
  const counts = summarizePlan(plan);
  return (
    `Plan: ${counts.create} to create, ${counts.recreate} to recreate, ` +
    `${counts['update-options']} to update, ${counts.delete} to delete, ${counts.noop} unchanged`
  );
}

export function formatPlan(plan: ReconciliationPlan): string[] {
  return [...plan.map(formatOperation), formatPlanSummary(plan)];
}

export function formatEntry(entry: ReportEntry): string {
  const head = `${entry.configurationId} ${entry.operation}`;
  switch (entry.outcome) {
    case 'success':
      return `ok      ${head}${entry.detail ? `: ${entry.detail}` : ''}`;
    case 'skipped':
      return `skipped ${head}${entry.detail ? `: ${entry.detail}` : ''}`;
    case 'error':
      return `error   ${head} [${entry.errorType ?? 'internal'}]: ${entry.detail ?? ''}`;
  }
}

export function formatReport(report: ReconciliationReport): string[] {
  const summary = summarizeReport(report);
  const lines = report.entries.map(formatEntry);
  lines.push(
    `Applied: ${summary.success} succeeded, ${summary.skipped} skipped, ${summary.error} failed` +
      (report.cancelled ? ' (cancelled)' : '')
  );
  return lines;
}

export function formatState(state: StoredState): string[] {
  if (state.size === 0) {
    return ['No integrations recorded'];
  }
  const lines: string[] = [];
  for (const [configurationId, record] of state) {
    lines.push(
      `${configurationId}: ${record.platform} -> ${record.instanceHandle} (updated ${new Date(record.updatedAt).toISOString()})`
    );
  }
  return lines;
}

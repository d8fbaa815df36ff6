import type { ApplyReport, JsonValue, Plan, PlanAction, PlanEntry, ResourceKind } from '@stacksmith/shared';
import { isAttributeRef, isSensitiveField } from '@stacksmith/engine';

const SYMBOLS: Record<PlanAction, string> = {
  Create: '+',
  Update: '~',
  ReplaceCreateThenDestroy: '-/+',
  Destroy: '-',
  NoOp: ' ',
};

export function formatValue(kind: ResourceKind, field: string, value: JsonValue | undefined): string {
  if (value === undefined) return '(removed)';
  if (isSensitiveField(kind, field)) return '(sensitive)';
  if (isAttributeRef(value)) return `<${value.$ref}.${value.attr}>`;
  return JSON.stringify(value);
}

function entryLines(entry: PlanEntry): string[] {
  const { node } = entry;
  const lines = [`${SYMBOLS[entry.action].padStart(3)} ${node.id} (${node.kind}): ${entry.action}, ${entry.reason}`];

  const fields =
    entry.action === 'Create' ? Object.keys(node.attributes) : entry.changedFields;
  if (entry.action !== 'Destroy') {
    for (const field of fields) {
      lines.push(`      ${field} = ${formatValue(node.kind, field, node.attributes[field])}`);
    }
  }
  for (const externalId of entry.cleanup) {
    lines.push(`      cleanup ${externalId}`);
  }
  return lines;
}

export function formatPlan(plan: Plan): string {
  const counts: Record<PlanAction, number> = {
    Create: 0,
    Update: 0,
    ReplaceCreateThenDestroy: 0,
    Destroy: 0,
    NoOp: 0,
  };
  const lines: string[] = [];

  for (const entry of plan.entries) {
    counts[entry.action]++;
    lines.push(...entryLines(entry));
  }
  for (const warning of plan.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  lines.push(
    `Plan: ${counts.Create} to create, ${counts.Update} to update, ` +
      `${counts.ReplaceCreateThenDestroy} to replace, ${counts.Destroy} to destroy, ` +
      `${counts.NoOp} unchanged.`
  );
  return lines.join('\n');
}

export function formatReport(report: ApplyReport): string {
  const lines: string[] = [];
  const tally = { Succeeded: 0, Failed: 0, Skipped: 0 };

  for (const result of report.results) {
    if (result.status === 'Succeeded' || result.status === 'Failed' || result.status === 'Skipped') {
      tally[result.status]++;
    }
    let detail = result.error ? `: ${result.error}` : '';
    if (result.cleanupError) detail += `: superseded resources left behind: ${result.cleanupError}`;
    lines.push(`${result.status.padEnd(9)} ${result.id} (${result.action})${detail}`);
  }

  lines.push(
    `Apply ${report.succeeded ? 'complete' : 'incomplete'}: ${tally.Succeeded} succeeded, ` +
      `${tally.Failed} failed, ${tally.Skipped} skipped.` +
      (report.cancelled ? ' Run was cancelled.' : '')
  );
  return lines.join('\n');
}

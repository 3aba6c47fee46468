/**
 * Output Formatting for CLI Commands
 *
 * Change listings and registry tables.
 *
 * @module cli/lib/output
 */

import type { EntryOutcome, FieldChange } from '../../driver/reconciliation-driver.js';

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a plain text table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...cells.map((row) => row[index].length))
  );

  const pad = (value: string, index: number): string =>
    columns[index].align === 'right' ? value.padStart(widths[index]) : value.padEnd(widths[index]);

  const headerRow = columns.map((column, index) => pad(column.header, index)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const dataRows = cells.map((row) => row.map(pad).join(' | ').trimEnd());

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * One line per new field, grouped by entry in key order:
 *
 *   knuth1984:
 *     doi = 10.1093/comjnl/27.2.97 (source: crossref, dblp)
 */
export function formatChanges(outcomes: readonly EntryOutcome[]): string {
  const changed = outcomes
    .filter((outcome) => outcome.changes.length > 0)
    .sort((a, b) => a.entryKey.localeCompare(b.entryKey));
  if (changed.length === 0) {
    return 'No new fields';
  }

  const lines: string[] = [];
  for (const outcome of changed) {
    lines.push(`${outcome.entryKey}:`);
    outcome.changes.forEach((change) => lines.push(`  ${formatChange(change)}`));
  }
  return lines.join('\n');
}

export function formatChange(change: FieldChange): string {
  const marker = change.overwritten ? ' (overwritten)' : '';
  return `${change.field} = ${change.value}${marker} (source: ${change.sources.join(', ')})`;
}

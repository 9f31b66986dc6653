/**
 * CLI Output Formatting Utilities
 */

import type { DiagnosisOutcome } from '@runwatch/core';

/**
 * Print data as a simple aligned table to stdout.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const colWidths = headers.map((h, i) => {
    const maxData = rows.reduce((max, row) => Math.max(max, (row[i] ?? '').length), 0);
    return Math.max(h.length, maxData);
  });

  const sep = colWidths.map((w) => '─'.repeat(w + 2)).join('┼');
  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => ` ${(cell ?? '').padEnd(colWidths[i] ?? 0)} `).join('│');

  console.log(formatRow(headers));
  console.log(sep);
  for (const row of rows) {
    console.log(formatRow(row));
  }
}

/**
 * Print JSON to stdout (pretty if tty, compact otherwise).
 */
export function printJson(data: unknown): void {
  const indent = process.stdout.isTTY ? 2 : 0;
  console.log(JSON.stringify(data, null, indent));
}

/**
 * Format a timestamp for table display.
 */
export function formatTimestamp(ts: string): string {
  const d = new Date(ts);
  if (isNaN(d.getTime())) return ts;
  return d.toLocaleString('en-US', {
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Truncate a string to a max length with "…" suffix.
 */
export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + '…';
}

/** Two lines per diagnosis: what failed, then what to do about it */
export function formatOutcome(outcome: DiagnosisOutcome): string[] {
  const { line, record, tier, action } = outcome;
  const advice = action.kind === 'auto_recoverable' ? 'auto-recover' : 'manual';
  return [
    `line ${line.lineIndex + 1} [${tier}] ${record.errorType} (${record.source}): ${record.rootCause}`,
    `  ${advice}: ${action.description}`,
  ];
}

/**
 * @fileoverview Terminal output helpers for CLI commands
 */

import type { StageOutcome } from '../core/types.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] || '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine);
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' | ');
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

export function printOutcomes(outcomes: readonly StageOutcome[]): void {
  if (outcomes.length === 0) {
    console.log('  (no stages run yet)');
    return;
  }
  printTable(
    ['Stage', 'Status', 'Exit', 'Duration'],
    outcomes.map((outcome) => [
      outcome.stage,
      outcome.status,
      String(outcome.exitCode),
      formatDuration(outcome.durationMs),
    ]),
  );
}

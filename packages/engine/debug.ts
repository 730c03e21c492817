/**
 * Debug output, enabled with DEBUG_CROSSTAB=true.
 */

import type {
  ContingencyMatrix,
  NormalizedMatrix,
  StratifiedTableSet,
} from './table-spec.js';

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_CROSSTAB === 'true';
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log('[crosstab]', ...args);
  }
}

// ---
// PRINTERS
// ---

/**
 * Print a contingency matrix for debugging.
 */
export function printMatrix(matrix: ContingencyMatrix): string {
  const lines: string[] = [];
  const stratum = matrix.stratum !== undefined ? ` [${matrix.stratum}]` : '';
  lines.push(`Matrix ${matrix.rows.variable} × ${matrix.cols.variable}${stratum}:`);
  lines.push(`  cols: ${matrix.colLabels.join(' | ')}`);
  matrix.rowLabels.forEach((label, i) => {
    lines.push(`  ${label}: ${matrix.counts[i].join(', ')}`);
  });
  if (matrix.margins) {
    lines.push(`  margins: row=${matrix.margins.row} col=${matrix.margins.col}`);
  }
  if (matrix.excluded > 0) {
    lines.push(`  excluded: ${matrix.excluded}`);
  }
  return lines.join('\n');
}

/**
 * Print a normalized matrix (counts with unrounded percentages).
 */
export function printNormalized(matrix: NormalizedMatrix): string {
  const lines: string[] = [`Normalized (${matrix.axis}):`];
  matrix.source.rowLabels.forEach((label, i) => {
    const cells = matrix.cells[i].map(c =>
      c.percentage === undefined ? `${c.count}` : `${c.count} (${c.percentage}%)`
    );
    lines.push(`  ${label}: ${cells.join(', ')}`);
  });
  return lines.join('\n');
}

/**
 * Print a stratified table set: one line per stratum.
 */
export function printTableSet(set: StratifiedTableSet): string {
  const lines: string[] = [`TableSet by ${set.variable}:`];
  for (const entry of set.entries) {
    if (entry.status === 'ok') {
      lines.push(`  ${entry.stratum}: ${entry.table.rowLabels.length}×${entry.table.colLabels.length}`);
    } else {
      lines.push(`  ${entry.stratum}: ${entry.error.name}: ${entry.error.message}`);
    }
  }
  return lines.join('\n');
}

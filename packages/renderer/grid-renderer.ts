/**
 * Grid Renderer
 *
 * Renders a FormattedTable (or a stratified set of them) to HTML.
 *
 * The column header honours the table's header groups: grouped columns get
 * a spanning parent header, ungrouped columns (e.g. the totals column) span
 * both header rows.
 */

import type {
  FormattedTable,
  HeaderGroup,
  StratifiedTableSet,
} from '../engine/table-spec.js';

// ---
// MAIN RENDER FUNCTION
// ---

export interface GridRenderOptions {
  /** CSS class for the table */
  tableClass?: string;
  /** Whether to show the row variable's label in the corner cell */
  showVariableLabels?: boolean;
  /**
   * Stratification variable; when set together with the table's stratum,
   * cell paths include `<variable>=<stratum>`
   */
  stratumVariable?: string;
}

/**
 * Render a formatted table to HTML.
 */
export function renderTableToHTML(
  table: FormattedTable,
  options: GridRenderOptions = {}
): string {
  const {
    tableClass = 'crosstab-table',
    showVariableLabels = true,
  } = options;

  const lines: string[] = [];
  lines.push(`<table class="${tableClass}">`);

  // Render column headers
  renderColumnHeaders(table, lines, showVariableLabels);

  // Render body (row headers + data cells)
  renderBody(table, lines, options.stratumVariable);

  lines.push('</table>');
  return lines.join('\n');
}

/**
 * Render every stratum of a set, in order. Failed strata render their error
 * in place of a table.
 */
export function renderTableSetToHTML(
  set: StratifiedTableSet,
  options: GridRenderOptions = {}
): string {
  const title = set.label ?? set.variable;
  const lines: string[] = [];
  lines.push(`<section class="crosstab-set" data-variable="${escapeHTML(set.variable)}">`);

  for (const entry of set.entries) {
    lines.push(`<h3>${escapeHTML(`${title}: ${entry.stratum}`)}</h3>`);
    if (entry.status === 'ok') {
      lines.push(renderTableToHTML(entry.table, { ...options, stratumVariable: set.variable }));
    } else {
      lines.push(
        `<p class="crosstab-error">${escapeHTML(`${entry.error.name}: ${entry.error.message}`)}</p>`
      );
    }
  }

  lines.push('</section>');
  return lines.join('\n');
}

// ---
// COLUMN HEADERS
// ---

/**
 * Render column header rows: one row when there are no header groups, two
 * rows otherwise.
 */
function renderColumnHeaders(
  table: FormattedTable,
  lines: string[],
  showVariableLabels: boolean
): void {
  const grouped = table.headerGroups.length > 0;
  const rowspan = grouped ? ' rowspan="2"' : '';
  const corner = showVariableLabels ? escapeHTML(table.rowTitle) : '';

  lines.push('<thead>');
  lines.push('<tr>');
  lines.push(`<th class="crosstab-corner"${rowspan}>${corner}</th>`);

  if (!grouped) {
    table.colLabels.forEach((label, j) => {
      lines.push(`<th${totalClass(table, 'col', j)}>${escapeHTML(label)}</th>`);
    });
    lines.push('</tr>');
    lines.push('</thead>');
    return;
  }

  // First row: group parents and ungrouped columns spanning both rows
  const groupedCols: number[] = [];
  let j = 0;
  while (j < table.colLabels.length) {
    const group = groupStartingAt(table.headerGroups, j);
    if (group && group.span > 0) {
      const colspan = group.span > 1 ? ` colspan="${group.span}"` : '';
      lines.push(`<th${colspan} class="crosstab-group">${escapeHTML(group.label)}</th>`);
      for (let k = j; k < j + group.span; k++) groupedCols.push(k);
      j += group.span;
    } else {
      lines.push(`<th${rowspan}${totalClass(table, 'col', j)}>${escapeHTML(table.colLabels[j])}</th>`);
      j++;
    }
  }
  lines.push('</tr>');

  // Second row: the grouped column labels
  lines.push('<tr>');
  for (const k of groupedCols) {
    lines.push(`<th>${escapeHTML(table.colLabels[k])}</th>`);
  }
  lines.push('</tr>');
  lines.push('</thead>');
}

function groupStartingAt(groups: readonly HeaderGroup[], col: number): HeaderGroup | undefined {
  return groups.find(g => g.start === col);
}

// ---
// BODY
// ---

function renderBody(table: FormattedTable, lines: string[], stratumVariable?: string): void {
  lines.push('<tbody>');

  table.rowLabels.forEach((rowLabel, i) => {
    lines.push(`<tr${totalClass(table, 'row', i)}>`);
    lines.push(`<th>${escapeHTML(rowLabel)}</th>`);

    table.colLabels.forEach((colLabel, j) => {
      const path = cellPath(table, rowLabel, colLabel, stratumVariable);
      const title = `${rowLabel} / ${colLabel}`;
      lines.push(
        `<td data-cell="${escapeHTML(path)}" title="${escapeHTML(title)}"${totalClass(table, 'col', j)}>` +
          `${escapeHTML(table.cells[i][j])}</td>`
      );
    });

    lines.push('</tr>');
  });

  lines.push('</tbody>');
}

/**
 * data-cell format: "[stratVar=stratum|]rowVar=row|colVar=col". Inside names
 * and labels a backslash escapes itself, `|` and `=`.
 */
function cellPath(
  table: FormattedTable,
  rowLabel: string,
  colLabel: string,
  stratumVariable?: string
): string {
  const parts: [string, string][] = [];
  if (stratumVariable !== undefined && table.stratum !== undefined) {
    parts.push([stratumVariable, table.stratum]);
  }
  parts.push([table.rowVariable, rowLabel]);
  parts.push([table.colVariable, colLabel]);
  return parts.map(([name, label]) => `${escapePathPart(name)}=${escapePathPart(label)}`).join('|');
}

function escapePathPart(text: string): string {
  return text.replace(/[\\|=]/g, ch => `\\${ch}`);
}

/**
 * Split a data-cell path back into its (variable, label) pairs, in order.
 */
export function parseCellPath(path: string): [string, string][] {
  const pairs: [string, string][] = [];
  let name = '';
  let label = '';
  let inLabel = false;

  for (let i = 0; i < path.length; i++) {
    let ch = path[i];
    if (ch === '\\' && i + 1 < path.length) {
      ch = path[++i];
    } else if (ch === '=' && !inLabel) {
      inLabel = true;
      continue;
    } else if (ch === '|') {
      if (inLabel) pairs.push([name, label]);
      name = '';
      label = '';
      inLabel = false;
      continue;
    }
    if (inLabel) label += ch;
    else name += ch;
  }
  if (inLabel) pairs.push([name, label]);
  return pairs;
}

/**
 * ` class="crosstab-total"` for the totals row (axis 'row', last row with
 * column totals) or totals column (axis 'col', last column with row totals).
 */
function totalClass(table: FormattedTable, axis: 'row' | 'col', index: number): string {
  const isTotal = axis === 'row'
    ? table.hasColTotals && index === table.rowLabels.length - 1
    : table.hasRowTotals && index === table.colLabels.length - 1;
  return isTotal ? ' class="crosstab-total"' : '';
}

// ---
// UTILITIES
// ---

function escapeHTML(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

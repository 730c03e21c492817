/**
 * Reads the data cells back out of HTML written by the grid renderer, keyed
 * by stratum, row label and column label.
 */

import { parseCellPath } from './grid-renderer.js';

export interface CellAddress {
  readonly row: string;
  readonly col: string;
  /** Set for cells of a stratified set */
  readonly stratum?: string;
}

export interface RenderedCell {
  readonly address: CellAddress;
  /** Cell text as displayed, e.g. "83% (43)" */
  readonly text: string;
  /** Raw data-cell path */
  readonly path: string;
  readonly title: string | null;
  /** Cell sits in the totals column */
  readonly total: boolean;
}

const CELL_PATTERN = /<td([^>]*)>([^<]*)<\/td>/g;

/**
 * Every data cell, in document order.
 */
export function readCells(html: string): RenderedCell[] {
  const cells: RenderedCell[] = [];
  for (const match of html.matchAll(CELL_PATTERN)) {
    const attrs = match[1];
    const path = attribute(attrs, 'data-cell');
    if (path === null) continue;

    const address = addressOf(parseCellPath(path));
    if (!address) continue;

    cells.push({
      address,
      text: unescapeHTML(match[2]),
      path,
      title: attribute(attrs, 'title'),
      total: attribute(attrs, 'class') === 'crosstab-total',
    });
  }
  return cells;
}

/**
 * Cells matching every given part of the address.
 */
export function findCells(html: string, query: Partial<CellAddress> = {}): RenderedCell[] {
  return readCells(html).filter(cell =>
    (query.row === undefined || cell.address.row === query.row) &&
    (query.col === undefined || cell.address.col === query.col) &&
    (query.stratum === undefined || cell.address.stratum === query.stratum)
  );
}

export function findCell(html: string, address: CellAddress): RenderedCell | undefined {
  return findCells(html, address)[0];
}

/**
 * The percentage shown in a cell, or null when the cell shows only a count.
 */
export function cellPercentage(html: string, address: CellAddress): number | null {
  const match = findCell(html, address)?.text.match(/^(-?\d+(?:\.\d+)?)%/);
  return match ? Number(match[1]) : null;
}

/**
 * The count shown in a cell: the parenthesised count of "83% (43)" or the
 * bare count of "43".
 */
export function cellCount(html: string, address: CellAddress): number | null {
  const text = findCell(html, address)?.text;
  if (text === undefined) return null;
  const match = text.match(/\((\d+)\)$/) ?? text.match(/^(\d+)$/);
  return match ? Number(match[1]) : null;
}

/** [stratum,] row, column */
function addressOf(pairs: [string, string][]): CellAddress | undefined {
  if (pairs.length === 2) {
    return { row: pairs[0][1], col: pairs[1][1] };
  }
  if (pairs.length === 3) {
    return { stratum: pairs[0][1], row: pairs[1][1], col: pairs[2][1] };
  }
  return undefined;
}

function attribute(attrs: string, name: string): string | null {
  const match = attrs.match(new RegExp(`${name}="([^"]*)"`));
  return match ? unescapeHTML(match[1]) : null;
}

function unescapeHTML(str: string): string {
  return str
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * renderer package - formatted tables to HTML
 */

export {
  renderTableToHTML,
  renderTableSetToHTML,
  parseCellPath,
  type GridRenderOptions,
} from './grid-renderer.js';

// Reading rendered cells back (used by tests)
export {
  readCells,
  findCells,
  findCell,
  cellPercentage,
  cellCount,
  type CellAddress,
  type RenderedCell,
} from './cell-reader.js';

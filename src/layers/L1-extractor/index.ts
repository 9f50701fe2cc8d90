export { parseColor } from './color-parse';
export {
  extractTableRows,
  findColorRow,
  extractColorCells,
  lookupWidgetColor,
  lookupPaletteColor,
} from './color-table';
export { readArchive } from './icon-archive';

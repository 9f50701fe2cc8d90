import { ThemeGenError, type ColorVariant, type RGBA } from '../../shared/types';
import { parseColor } from './color-parse';

// Every color on the page is a table row.
const TABLE_ROW = /<tr>([\s\S]*?)<\/tr>/g;

// Color values sit in <tt> cells: the light variant first, then the dark one.
const COLOR_CELL = /<tt>((?:rgba|#)[\s\S]*?)<\/tt>/g;

/** Bodies of every `<tr>` on the page, in document order. */
export function extractTableRows(html: string): string[] {
  return Array.from(html.matchAll(TABLE_ROW), (m) => m[1]);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First row naming `@name`. The page HTML-encodes `@` as `&#64;` in some
 * releases, so both spellings match. The name must end at a non-identifier
 * character: `@red_3` does not match `@red_30`.
 */
export function findColorRow(rows: string[], name: string): string | undefined {
  const pattern = new RegExp(`(?:@|&#64;)${escapeRegExp(name)}(?![\\w-])`);
  return rows.find((row) => pattern.test(row));
}

/** Values of the color cells of a row, in order. */
export function extractColorCells(row: string): string[] {
  return Array.from(row.matchAll(COLOR_CELL), (m) => m[1].trim());
}

function requireRow(rows: string[], name: string): string {
  const row = findColorRow(rows, name);
  if (row === undefined) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E302',
      severity: 'high',
      message: `Color @${name} not found on the named-colors page`,
      context: { name },
    });
  }
  return row;
}

function cellAt(row: string, index: number, name: string, variant: ColorVariant): RGBA {
  const cells = extractColorCells(row);
  if (index >= cells.length) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E303',
      severity: 'high',
      message: `Color @${name} has no ${variant} value (found ${cells.length} cell(s))`,
      context: { name, variant },
    });
  }
  return parseColor(cells[index]);
}

/** Widget colors carry both variants in one row. */
export function lookupWidgetColor(rows: string[], name: string, variant: ColorVariant): RGBA {
  const row = requireRow(rows, name);
  return cellAt(row, variant === 'light' ? 0 : 1, name, variant);
}

/** Palette colors have a single value per row. */
export function lookupPaletteColor(rows: string[], name: string, variant: ColorVariant): RGBA {
  const row = requireRow(rows, name);
  return cellAt(row, 0, name, variant);
}

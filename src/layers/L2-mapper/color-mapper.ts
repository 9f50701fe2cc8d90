import { lookupPaletteColor, lookupWidgetColor } from '../L1-extractor/color-table';
import type { ColorSample, ColorScheme, ColorTable } from '../../shared/types';
import { createLogger } from '../../shared/logger';

const log = createLogger({ module: 'color-mapper' });

export function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Build the light and dark schemes from the page rows.
 *
 * Widget colors read both variants from one row. Palette colors read the
 * single value of the light row and of the dark row, which may differ.
 */
export function mapColorScheme(rows: string[], table: ColorTable): ColorScheme {
  const light: ColorSample[] = [];
  const dark: ColorSample[] = [];

  for (const [name, source] of Object.entries(table.widget)) {
    light.push({ name, source, color: lookupWidgetColor(rows, source, 'light') });
    dark.push({ name, source, color: lookupWidgetColor(rows, source, 'dark') });
  }

  for (const [name, mapping] of Object.entries(table.palette)) {
    const lightSource = mapping.light;
    const darkSource = mapping.dark ?? mapping.light;
    const lightColor = lookupPaletteColor(rows, lightSource, 'light');
    const darkColor = lookupPaletteColor(rows, darkSource, 'dark');

    if (mapping.alpha !== undefined) {
      lightColor.a = mapping.alpha;
      darkColor.a = mapping.alpha;
    }

    light.push({ name, source: lightSource, color: lightColor });
    dark.push({ name, source: darkSource, color: darkColor });
  }

  light.sort(byName);
  dark.sort(byName);

  log.info({ colors: light.length, rows: rows.length }, 'Mapped color scheme');
  return { light, dark };
}

export { loadColorTable, loadIconTable, DATA_DIR } from './tables';
export { mapColorScheme, byName } from './color-mapper';
export { mapIcons, wantedPaths } from './icon-mapper';
export type { IconMapOptions } from './icon-mapper';
export { svgToPng, pngName } from './svg-converter';
export type { ConverterOptions } from './svg-converter';

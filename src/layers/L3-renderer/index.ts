export { renderColorSource, renderIconSource, colorLiteral, hexByte } from './templates';
export type { RenderOptions } from './templates';
export { formatSource } from './format';

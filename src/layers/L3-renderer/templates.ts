import type { ColorSample, ColorScheme, IconSample, RGBA } from '../../shared/types';

export const REGENERATE_COMMAND = 'adwaita-themegen generate';
export const ICON_REPOSITORY = 'https://gitlab.gnome.org/GNOME/adwaita-icon-theme';
export const ICON_LICENCE_URL = `${ICON_REPOSITORY}/-/blob/master/COPYING_CCBYSA3`;

export interface RenderOptions {
  /** Module the generated file imports the theme types from. */
  themeModule: string;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/** `0x5b`-style literal, two lowercase digits. */
export function hexByte(n: number): string {
  return `0x${n.toString(16).padStart(2, '0')}`;
}

export function colorLiteral(c: RGBA): string {
  return `{ r: ${hexByte(c.r)}, g: ${hexByte(c.g)}, b: ${hexByte(c.b)}, a: ${hexByte(c.a)} }`;
}

function generatedHeader(): string[] {
  return [
    '// This file is generated by adwaita-themegen.',
    '// Please do not edit manually, use:',
    `//   ${REGENERATE_COMMAND}`,
    '//',
  ];
}

function schemeBlock(variableName: string, samples: ColorSample[]): string[] {
  const lines: string[] = [];
  lines.push(`export const ${variableName}: Partial<Record<ThemeColorName, Color>> = {`);
  for (const sample of samples) {
    lines.push(`  ${propertyKey(sample.name)}: ${colorLiteral(sample.color)}, // Adwaita color name @${sample.source}`);
  }
  lines.push('};');
  return lines;
}

export function renderColorSource(scheme: ColorScheme, sourceUrl: string, options: RenderOptions): string {
  const lines: string[] = [...generatedHeader()];
  lines.push(`// The colors are taken from: ${sourceUrl}`);
  lines.push('');
  lines.push(`import type { Color, ThemeColorName } from ${JSON.stringify(options.themeModule)};`);
  lines.push('');
  lines.push(...schemeBlock('adwaitaDarkScheme', scheme.dark));
  lines.push('');
  lines.push(...schemeBlock('adwaitaLightScheme', scheme.light));
  return lines.join('\n') + '\n';
}

function isText(icon: IconSample): boolean {
  return icon.staticName.endsWith('.svg');
}

function resourceFields(icon: IconSample, indent: string): string[] {
  const fields = [`${indent}name: ${JSON.stringify(icon.staticName)},`];
  if (isText(icon)) {
    fields.push(`${indent}content: ${JSON.stringify(icon.content.toString('utf-8'))},`);
  } else {
    fields.push(`${indent}content: ${JSON.stringify(icon.content.toString('base64'))},`);
    fields.push(`${indent}encoding: "base64",`);
  }
  return fields;
}

export function renderIconSource(icons: IconSample[], options: RenderOptions): string {
  const lines: string[] = [...generatedHeader()];
  lines.push('// These icons come from "GNOME Project"');
  lines.push(`// Repository: ${ICON_REPOSITORY}`);
  lines.push('// Licence: CC-BY-SA 3.0');
  lines.push(`// See: ${ICON_LICENCE_URL}`);
  lines.push('');
  lines.push(
    `import { themedResource, type StaticResource, type ThemeIconName } from ${JSON.stringify(options.themeModule)};`,
  );
  lines.push('');
  lines.push('export const adwaitaIcons: Partial<Record<ThemeIconName, StaticResource>> = {');
  for (const icon of icons) {
    const key = propertyKey(icon.name);
    if (icon.themed) {
      lines.push(`  ${key}: themedResource({`);
      lines.push(...resourceFields(icon, '    '));
      lines.push('  }),');
    } else {
      lines.push(`  ${key}: {`);
      lines.push(...resourceFields(icon, '    '));
      lines.push('  },');
    }
  }
  lines.push('};');
  return lines.join('\n') + '\n';
}

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ThemeGenError, toError, type ColorTable, type IconTable } from '../../shared/types';

// At runtime __dirname is src/layers/L2-mapper (or dist/layers/L2-mapper),
// so the package root is 3 levels up.
export const DATA_DIR = path.join(__dirname, '../../../data');

const adwaitaName = z.string().regex(/^[a-z0-9_]+$/, 'Adwaita color names are written without "@"');

const colorTableSchema = z
  .object({
    widget: z.record(adwaitaName),
    palette: z.record(
      z
        .object({
          light: adwaitaName,
          dark: adwaitaName.optional(),
          alpha: z.number().int().min(0).max(255).optional(),
        })
        .strict(),
    ),
  })
  .strict();

const iconTableSchema = z
  .object({
    icons: z.record(z.string().regex(/^$|^[\w./-]+\.svg$/, 'icon paths point at .svg files')),
    forcePng: z.array(z.string().min(1)),
  })
  .strict()
  .superRefine((table, ctx) => {
    for (const name of table.forcePng) {
      if (!(name in table.icons)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['forcePng'],
          message: `"${name}" is not a mapped icon`,
        });
      }
    }
  });

function readTable<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E101',
      severity: 'critical',
      message: `Cannot read name table ${filePath}: ${toError(err).message}`,
      context: { path: filePath },
      cause: toError(err),
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ThemeGenError({
      code: 'THEMEGEN_E101',
      severity: 'critical',
      message: `Invalid name table ${filePath}: ${issues}`,
      context: { path: filePath },
    });
  }
  return result.data;
}

export function loadColorTable(filePath: string = path.join(DATA_DIR, 'colors.json')): ColorTable {
  return readTable(filePath, colorTableSchema);
}

export function loadIconTable(filePath: string = path.join(DATA_DIR, 'icons.json')): IconTable {
  return readTable(filePath, iconTableSchema);
}

import { z } from 'zod';

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: 'Must be an http(s) URL' });

export const themeGenConfigSchema = z
  .object({
    sources: z
      .object({
        color_page: httpUrl.optional(),
        icon_archive: httpUrl.optional(),
        timeout_ms: z.number().int().min(1000).max(600_000).optional(),
        user_agent: z.string().min(1).max(200).optional(),
      })
      .strict()
      .optional(),

    output: z
      .object({
        dir: z.string().min(1).optional(),
        colors_file: z.string().regex(/^[\w.-]+\.ts$/, 'Must be a .ts file name').optional(),
        icons_file: z.string().regex(/^[\w.-]+\.ts$/, 'Must be a .ts file name').optional(),
        theme_module: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    icons: z
      .object({
        archive_root: z.string().min(1).optional(),
        converter: z.string().min(1).optional(),
        converter_timeout_ms: z.number().int().min(1000).max(600_000).optional(),
      })
      .strict()
      .optional(),

    tables: z
      .object({
        colors: z.string().min(1).optional(),
        icons: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ThemeGenConfigInput = z.input<typeof themeGenConfigSchema>;

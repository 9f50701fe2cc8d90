/**
 * Theme generation pipeline: fetch → extract → map → render → write,
 * once per output file.
 */

import path from 'path';
import type { ResolvedThemeGenConfig } from './config';
import { fetchArchive, fetchPage, type FetchOptions, type HttpClient } from './layers/L0-fetch';
import { extractTableRows, readArchive } from './layers/L1-extractor';
import {
  loadColorTable,
  loadIconTable,
  mapColorScheme,
  mapIcons,
  svgToPng,
  wantedPaths,
} from './layers/L2-mapper';
import { formatSource, renderColorSource, renderIconSource } from './layers/L3-renderer';
import { writeOutput, type WriteOutcome } from './layers/L4-writer';
import { createLogger } from './shared/logger';

const log = createLogger({ module: 'generator' });

export type Target = 'colors' | 'icons';
export const ALL_TARGETS: Target[] = ['colors', 'icons'];

export interface GeneratorContext {
  config: ResolvedThemeGenConfig;
  /** Base directory for relative output and table paths. */
  cwd: string;
  dryRun?: boolean;
  httpClient?: HttpClient;
  /** Overrides the external converter, mainly for tests. */
  convert?: (svg: Buffer, svgName: string) => Buffer;
}

export interface TargetResult {
  target: Target;
  path: string;
  outcome: WriteOutcome;
  /** Colors per scheme, or bundled icons. */
  count: number;
}

function fetchOptions(ctx: GeneratorContext): FetchOptions {
  return {
    timeoutMs: ctx.config.sources.timeout_ms,
    userAgent: ctx.config.sources.user_agent,
    httpClient: ctx.httpClient,
  };
}

function outputPath(ctx: GeneratorContext, fileName: string): string {
  return path.resolve(ctx.cwd, ctx.config.output.dir, fileName);
}

function tablePath(ctx: GeneratorContext, configured: string | undefined): string | undefined {
  return configured === undefined ? undefined : path.resolve(ctx.cwd, configured);
}

export async function generateColorScheme(ctx: GeneratorContext): Promise<TargetResult> {
  const { config } = ctx;
  const table = loadColorTable(tablePath(ctx, config.tables.colors));

  const html = await fetchPage(config.sources.color_page, fetchOptions(ctx));
  const rows = extractTableRows(html);
  const scheme = mapColorScheme(rows, table);

  const filePath = outputPath(ctx, config.output.colors_file);
  const source = renderColorSource(scheme, config.sources.color_page, {
    themeModule: config.output.theme_module,
  });
  const formatted = await formatSource(source, filePath);
  const outcome = writeOutput(filePath, formatted, { dryRun: ctx.dryRun });

  return { target: 'colors', path: filePath, outcome, count: scheme.light.length };
}

export async function generateIcons(ctx: GeneratorContext): Promise<TargetResult> {
  const { config } = ctx;
  const table = loadIconTable(tablePath(ctx, config.tables.icons));
  const archiveRoot = config.icons.archive_root;

  const archive = await fetchArchive(config.sources.icon_archive, fetchOptions(ctx));
  const wanted = wantedPaths(table, archiveRoot);
  const entries = await readArchive(archive, (entryPath) => wanted.has(entryPath));
  log.info({ entries: entries.size, wanted: wanted.size }, 'Extracted archive');

  const convert =
    ctx.convert ??
    ((svg: Buffer, svgName: string) =>
      svgToPng(svg, svgName, {
        command: config.icons.converter,
        timeoutMs: config.icons.converter_timeout_ms,
      }));
  const icons = mapIcons(entries, table, { archiveRoot, convert });

  const filePath = outputPath(ctx, config.output.icons_file);
  const source = renderIconSource(icons, { themeModule: config.output.theme_module });
  const formatted = await formatSource(source, filePath);
  const outcome = writeOutput(filePath, formatted, { dryRun: ctx.dryRun });

  return { target: 'icons', path: filePath, outcome, count: icons.length };
}

/** Run the selected targets in order. The first failure aborts the run. */
export async function generateTheme(
  ctx: GeneratorContext,
  targets: Target[] = ALL_TARGETS,
): Promise<TargetResult[]> {
  const results: TargetResult[] = [];
  for (const target of targets) {
    const result = target === 'colors' ? await generateColorScheme(ctx) : await generateIcons(ctx);
    log.info({ target, path: result.path, outcome: result.outcome, count: result.count }, 'Generated');
    results.push(result);
  }
  return results;
}

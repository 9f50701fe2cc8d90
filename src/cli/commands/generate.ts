/**
 * `adwaita-themegen generate|colors|icons`: run the generation pipeline.
 */

import path from 'path';
import { DEFAULT_CONFIG_FILE, loadThemeGenConfig } from '../../config';
import { generateTheme, type GeneratorContext, type Target, type TargetResult } from '../../generator';
import { ThemeGenError } from '../../shared/types';
import logger from '../../shared/logger';
import { color, formatResults, formatWarnings } from '../output';

export interface GenerateOptions {
  targets: Target[];
  configPath?: string;
  outDir?: string;
  dryRun?: boolean;
  json?: boolean;
  cwd?: string;
}

export type GenerateFn = (ctx: GeneratorContext, targets: Target[]) => Promise<TargetResult[]>;

export async function runGenerate(
  options: GenerateOptions,
  write: (msg: string) => void = console.log,
  generate: GenerateFn = generateTheme,
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const { config, warnings } = loadThemeGenConfig(
    path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE),
  );
  // Under --json the warnings travel inside the document.
  if (warnings.length > 0 && !options.json) {
    write(formatWarnings(warnings));
  }
  if (options.outDir) {
    config.output.dir = options.outDir;
  }

  try {
    const results = await generate({ config, cwd, dryRun: options.dryRun }, options.targets);
    if (options.json) {
      write(JSON.stringify({ results, warnings }, null, 2));
    } else {
      write(formatResults(results, cwd));
    }
    return 0;
  } catch (err) {
    if (err instanceof ThemeGenError) {
      logger.error({ err, code: err.code, severity: err.severity, context: err.context }, err.message);
      write(`${color.red('Error')} ${err.code}: ${err.userMessage ?? err.message}`);
    } else {
      logger.error({ err }, 'Unexpected error');
      write(`${color.red('Error')} ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}

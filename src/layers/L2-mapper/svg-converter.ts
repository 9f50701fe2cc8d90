/**
 * SVG → PNG rasterization through an external converter (inkscape by default).
 * Used only for the few icons whose SVG the consumer's renderer cannot draw.
 */

import { execFileSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ThemeGenError, toError } from '../../shared/types';
import { createLogger } from '../../shared/logger';

const log = createLogger({ module: 'svg-converter' });

export interface ConverterOptions {
  command: string;
  timeoutMs: number;
}

export function pngName(svgName: string): string {
  return svgName.replace(/\.svg$/, '') + '.png';
}

export function svgToPng(svg: Buffer, svgName: string, options: ConverterOptions): Buffer {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'themegen-'));
  const input = path.join(tmpDir, path.basename(svgName));
  const output = pngName(input);

  try {
    fs.writeFileSync(input, svg);
    log.info({ file: svgName }, 'Converting to PNG');

    try {
      execFileSync(
        options.command,
        ['--export-type=png', '--export-area-drawing', '--vacuum-defs', input],
        { timeout: options.timeoutMs, stdio: 'pipe' },
      );
    } catch (err) {
      const cause = toError(err);
      const missing = 'code' in cause && cause.code === 'ENOENT';
      throw new ThemeGenError({
        code: 'THEMEGEN_E401',
        severity: 'medium',
        message: missing
          ? `Converter "${options.command}" not found in PATH`
          : `Converter "${options.command}" failed on ${svgName}: ${cause.message}`,
        context: { path: svgName },
        cause,
      });
    }

    if (!fs.existsSync(output)) {
      throw new ThemeGenError({
        code: 'THEMEGEN_E401',
        severity: 'medium',
        message: `Converter "${options.command}" produced no PNG for ${svgName}`,
        context: { path: svgName },
      });
    }
    return fs.readFileSync(output);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

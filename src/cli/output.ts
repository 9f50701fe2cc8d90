/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

import path from 'path';
import type { TargetResult } from '../generator';
import type { ConfigWarning } from '../config';

const NO_COLOR = !!process.env.NO_COLOR || process.env.TERM === 'dumb';
const FORCE_COLOR = !!process.env.FORCE_COLOR;

function useColor(): boolean {
  if (FORCE_COLOR) return true;
  if (NO_COLOR) return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  boldRed: `${ESC}1;31m`,
  boldGreen: `${ESC}1;32m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  dim: (t: string) => wrap(codes.dim, t),
  boldGreen: (t: string) => wrap(codes.boldGreen, t),
};

const OUTCOME_LABEL: Record<TargetResult['outcome'], string> = {
  written: 'wrote',
  unchanged: 'up to date',
  'dry-run': 'dry run',
};

export function formatResults(results: TargetResult[], cwd: string): string {
  const lines = results.map((r) => {
    const unit = r.target === 'colors' ? 'colors per scheme' : 'icons';
    const file = path.relative(cwd, r.path) || r.path;
    return `  ${color.boldGreen('✓')} ${r.target.padEnd(7)}${file} ${color.dim(`(${r.count} ${unit}, ${OUTCOME_LABEL[r.outcome]})`)}`;
  });
  return lines.join('\n');
}

export function formatWarnings(warnings: ConfigWarning[]): string {
  return warnings.map((w) => `  ${color.yellow('!')} ${w.field}: ${w.message}`).join('\n');
}

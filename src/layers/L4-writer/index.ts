import fs from 'fs';
import path from 'path';
import { ThemeGenError, toError } from '../../shared/types';
import { createLogger } from '../../shared/logger';

const log = createLogger({ module: 'writer' });

export type WriteOutcome = 'written' | 'unchanged' | 'dry-run';

export interface WriteOptions {
  dryRun?: boolean;
}

function readExisting(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/** Write a generated file, leaving it untouched when the content is identical. */
export function writeOutput(filePath: string, content: string, options: WriteOptions = {}): WriteOutcome {
  const bytes = Buffer.byteLength(content);

  if (options.dryRun) {
    log.info({ path: filePath, bytes }, 'Dry run, not writing');
    return 'dry-run';
  }

  if (readExisting(filePath) === content) {
    log.info({ path: filePath }, 'Output up to date');
    return 'unchanged';
  }

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E601',
      severity: 'high',
      message: `Cannot write ${filePath}: ${toError(err).message}`,
      context: { path: filePath },
      cause: toError(err),
    });
  }

  log.info({ path: filePath, bytes }, 'Wrote output');
  return 'written';
}

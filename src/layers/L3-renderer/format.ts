import { format } from 'prettier';
import { ThemeGenError, toError } from '../../shared/types';

const PRETTIER_OPTIONS = {
  parser: 'typescript',
  singleQuote: true,
  trailingComma: 'all',
  printWidth: 100,
} as const;

/** Format generated TypeScript. A source the formatter rejects is a template bug. */
export async function formatSource(source: string, filePath: string): Promise<string> {
  try {
    return await format(source, { ...PRETTIER_OPTIONS, filepath: filePath });
  } catch (err) {
    throw new ThemeGenError({
      code: 'THEMEGEN_E501',
      severity: 'critical',
      message: `Generated source for ${filePath} does not parse: ${toError(err).message}`,
      context: { path: filePath },
      cause: toError(err),
    });
  }
}

import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { themeGenConfigSchema } from './schema';
import type { ThemeGenConfig } from '../shared/types';

export interface ConfigWarning {
  field: string;
  message: string;
}

type Section<K extends keyof ThemeGenConfig> = Required<NonNullable<ThemeGenConfig[K]>>;

export interface ResolvedThemeGenConfig {
  sources: Section<'sources'>;
  output: Section<'output'>;
  icons: Section<'icons'>;
  /** Unset entries fall back to the tables bundled under data/. */
  tables: NonNullable<ThemeGenConfig['tables']>;
}

export interface LoadConfigResult {
  config: ResolvedThemeGenConfig;
  warnings: ConfigWarning[];
}

export const DEFAULT_CONFIG_FILE = '.themegen.yml';

/** Values used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: ResolvedThemeGenConfig = {
  sources: {
    color_page: 'https://gnome.pages.gitlab.gnome.org/libadwaita/doc/1.0/named-colors.html',
    icon_archive:
      'https://gitlab.gnome.org/GNOME/adwaita-icon-theme/-/archive/master/adwaita-icon-theme-master.tar?path=Adwaita',
    timeout_ms: 60_000,
    user_agent: 'adwaita-themegen/0.1 (+build-time theme generator)',
  },
  output: {
    dir: 'src/theme',
    colors_file: 'adwaita-colors.ts',
    icons_file: 'adwaita-icons.ts',
    theme_module: './theme',
  },
  icons: {
    archive_root: 'adwaita-icon-theme-master-Adwaita/Adwaita',
    converter: 'inkscape',
    converter_timeout_ms: 60_000,
  },
  tables: {},
};

/**
 * Load and validate a .themegen.yml configuration file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E102 warning + defaults
 * - Invalid values → E103 warning + field defaults
 * - Unknown keys → E103 warning with "did you mean?"
 */
export function loadThemeGenConfig(filePath?: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  // 1. Try to read file
  const resolvedPath = filePath ?? DEFAULT_CONFIG_FILE;
  let rawContent: string;
  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    return { config: resolveConfig({}), warnings };
  }

  // 2. Handle empty file
  if (!rawContent || rawContent.trim() === '') {
    return { config: resolveConfig({}), warnings };
  }

  // 3. Parse YAML
  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E102: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: resolveConfig({}), warnings };
  }

  // Just comments
  if (parsed === null || parsed === undefined) {
    return { config: resolveConfig({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E102: Config must be a YAML mapping. Using defaults.',
    });
    return { config: resolveConfig({}), warnings };
  }

  // 4. Validate with Zod (strict mode catches unknown keys)
  const result = themeGenConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: resolveConfig(result.data), warnings };
  }

  for (const issue of result.error.issues) {
    warnings.push(...describeIssue(issue));
  }

  // 5. Drop offending fields and re-parse
  const cleaned = structuredClone(parsed);
  for (const issue of result.error.issues) {
    removeIssue(cleaned, issue);
  }
  const retry = themeGenConfigSchema.safeParse(cleaned);
  if (retry.success) {
    return { config: resolveConfig(retry.data), warnings };
  }

  return { config: resolveConfig({}), warnings };
}

/** User values take precedence over defaults, section by section. */
export function resolveConfig(user: ThemeGenConfig): ResolvedThemeGenConfig {
  return {
    sources: { ...CONFIG_DEFAULTS.sources, ...user.sources },
    output: { ...CONFIG_DEFAULTS.output, ...user.output },
    icons: { ...CONFIG_DEFAULTS.icons, ...user.icons },
    tables: { ...CONFIG_DEFAULTS.tables, ...user.tables },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function describeIssue(issue: ZodIssue): ConfigWarning[] {
  const fieldPath = issue.path.join('.');
  if (issue.code === 'unrecognized_keys') {
    const keys = issue.keys;
    return keys.map((key) => {
      const known = fieldPath === '' ? KNOWN_KEYS : (SECTION_KEYS[fieldPath] ?? []);
      const suggestion = findSimilarKey(key, known);
      const field = fieldPath ? `${fieldPath}.${key}` : key;
      return {
        field,
        message: suggestion
          ? `E103: Unknown key "${field}". Did you mean "${suggestion}"?`
          : `E103: Unknown key "${field}".`,
      };
    });
  }
  return [
    {
      field: fieldPath || '_unknown',
      message: `E103: ${issue.message}. Using default for this field.`,
    },
  ];
}

function removeIssue(root: Record<string, unknown>, issue: ZodIssue): void {
  let target: Record<string, unknown> = root;
  const segments = issue.path.map(String);
  const parents = issue.code === 'unrecognized_keys' ? segments : segments.slice(0, -1);

  for (const segment of parents) {
    const next = target[segment];
    if (!isRecord(next)) {
      // A section that is not a mapping at all: drop the whole section.
      delete target[segment];
      return;
    }
    target = next;
  }

  if (issue.code === 'unrecognized_keys') {
    for (const key of issue.keys) delete target[key];
  } else if (segments.length > 0) {
    delete target[segments[segments.length - 1]];
  }
}

/** Known top-level keys for "did you mean?" suggestions. */
const KNOWN_KEYS = ['sources', 'output', 'icons', 'tables'];

const SECTION_KEYS: Record<string, string[]> = {
  sources: ['color_page', 'icon_archive', 'timeout_ms', 'user_agent'],
  output: ['dir', 'colors_file', 'icons_file', 'theme_module'],
  icons: ['archive_root', 'converter', 'converter_timeout_ms'],
  tables: ['colors', 'icons'],
};

function findSimilarKey(key: string, known: string[]): string | null {
  const lower = key.toLowerCase();
  for (const candidate of known) {
    if (levenshtein(lower, candidate) <= 3) {
      return candidate;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

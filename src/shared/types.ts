// === Extracted records ===

/** Non-premultiplied color, each channel 0..255. */
export interface RGBA {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type ColorVariant = 'light' | 'dark';

export interface ColorSample {
  /** Theme color name the consumer looks up, e.g. `background`. */
  name: string;
  color: RGBA;
  /** Adwaita color name without the leading `@`. */
  source: string;
}

export interface ColorScheme {
  light: ColorSample[];
  dark: ColorSample[];
}

export interface IconSample {
  /** Theme icon name, e.g. `cancel`. */
  name: string;
  /** Basename of the bundled asset. */
  staticName: string;
  content: Buffer;
  /** Symbolic icons are recolored by the consumer. */
  themed: boolean;
}

/** Archive-relative path → file bytes. Regular files only. */
export type ArchiveEntries = Map<string, Buffer>;

// === Name tables (data/*.json) ===

export interface PaletteMapping {
  light: string;
  dark?: string;
  /** Replaces the alpha byte of both variants. */
  alpha?: number;
}

export interface ColorTable {
  widget: Record<string, string>;
  palette: Record<string, PaletteMapping>;
}

export interface IconTable {
  icons: Record<string, string>;
  forcePng: string[];
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export interface ErrorContext {
  url?: string;
  path?: string;
  name?: string;
  variant?: ColorVariant;
}

export class ThemeGenError extends Error {
  readonly code: string;
  readonly severity: ErrorSeverity;
  readonly userMessage?: string;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly timestamp: string;

  constructor(opts: {
    code: string;
    severity: ErrorSeverity;
    message: string;
    userMessage?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message);
    this.name = 'ThemeGenError';
    this.code = opts.code;
    this.severity = opts.severity;
    this.userMessage = opts.userMessage;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
    this.timestamp = new Date().toISOString();
  }
}

/** Normalize an unknown thrown value into an Error for `cause`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// === Generator Config (.themegen.yml) ===

export interface ThemeGenConfig {
  sources?: {
    color_page?: string;
    icon_archive?: string;
    timeout_ms?: number;
    user_agent?: string;
  };
  output?: {
    dir?: string;
    colors_file?: string;
    icons_file?: string;
    theme_module?: string;
  };
  icons?: {
    archive_root?: string;
    converter?: string;
    converter_timeout_ms?: number;
  };
  tables?: {
    colors?: string;
    icons?: string;
  };
}

export { loadThemeGenConfig, resolveConfig, CONFIG_DEFAULTS, DEFAULT_CONFIG_FILE } from './loader';
export type { ConfigWarning, LoadConfigResult, ResolvedThemeGenConfig } from './loader';
export { themeGenConfigSchema } from './schema';

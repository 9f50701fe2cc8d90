/**
 * CLI help text for global and per-command --help output.
 */

const SHARED_FLAGS = `FLAGS
  --config=PATH     Configuration file (default: .themegen.yml)
  --out-dir=DIR     Directory the generated files are written to
  --dry-run         Run the whole pipeline but write nothing
  --json            Print the results as JSON`;

const COMMAND_HELP: Record<string, string> = {
  generate: `
SYNOPSIS
  adwaita-themegen generate [--config=PATH] [--out-dir=DIR] [--dry-run] [--json]

DESCRIPTION
  Generate both theme files: the light and dark color schemes from the
  libadwaita named-colors page, then the icon bundle from the Adwaita
  icon theme archive. Stops at the first error.

${SHARED_FLAGS}

EXAMPLES
  adwaita-themegen generate
  adwaita-themegen generate --out-dir=src/ui/theme
  adwaita-themegen generate --dry-run
`.trim(),

  colors: `
SYNOPSIS
  adwaita-themegen colors [--config=PATH] [--out-dir=DIR] [--dry-run] [--json]

DESCRIPTION
  Generate only the color scheme file. Every color in the name table
  must be present on the page, or the command fails.

${SHARED_FLAGS}

EXAMPLES
  adwaita-themegen colors
  adwaita-themegen colors --config=ci/themegen.yml
`.trim(),

  icons: `
SYNOPSIS
  adwaita-themegen icons [--config=PATH] [--out-dir=DIR] [--dry-run] [--json]

DESCRIPTION
  Generate only the icon bundle. Icons missing from the archive, or
  whose PNG conversion fails, are logged and left out. Conversion
  needs inkscape (or the configured converter) on PATH.

${SHARED_FLAGS}

EXAMPLES
  adwaita-themegen icons
  adwaita-themegen icons --dry-run --json
`.trim(),
};

export function getGlobalHelp(): string {
  const lines: string[] = [
    'Usage: adwaita-themegen <command> [options]',
    '',
    'Generates Adwaita color schemes and icon bundles as TypeScript sources.',
    '',
    'Commands:',
    '  generate              Generate colors and icons',
    '  colors                Generate the color schemes only',
    '  icons                 Generate the icon bundle only',
    '  help                  Show this help',
    '',
    'Run `adwaita-themegen <command> --help` for command options.',
  ];
  return lines.join('\n');
}

export function getCommandHelp(command: string): string | null {
  return COMMAND_HELP[command] ?? null;
}

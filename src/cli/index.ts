/**
 * adwaita-themegen CLI entry point.
 *
 * Usage:
 *   adwaita-themegen generate    Generate colors and icons
 *   adwaita-themegen colors      Generate the color schemes only
 *   adwaita-themegen icons       Generate the icon bundle only
 */

import { runGenerate, type GenerateFn } from './commands/generate';
import { generateTheme, type Target } from '../generator';
import { getGlobalHelp, getCommandHelp } from './help';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json', 'dry-run'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value, unless the key is a known boolean flag
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

const COMMAND_TARGETS: Record<string, Target[]> = {
  generate: ['colors', 'icons'],
  colors: ['colors'],
  icons: ['icons'],
};

export async function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  generate: GenerateFn = generateTheme,
): Promise<number> {
  const { command, flags, options } = parseArgs(argv);

  // Handle --help flag for any command
  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  if (command === 'help' || command === '') {
    write(getGlobalHelp());
    return 0;
  }

  const targets = COMMAND_TARGETS[command];
  if (!targets) {
    write(`Unknown command: ${command}. Run \`adwaita-themegen help\` for usage.`);
    return 2;
  }

  return runGenerate(
    {
      targets,
      configPath: options.config,
      outDir: options['out-dir'],
      dryRun: !!flags['dry-run'],
      json: !!flags.json,
    },
    write,
    generate,
  );
}

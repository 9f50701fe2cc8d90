import { describe, it, expect, vi, type Mock } from 'vitest';
import path from 'path';
import { parseArgs, run } from '../../src/cli/index';
import type { GenerateFn } from '../../src/cli/commands/generate';
import type { TargetResult } from '../../src/generator';

function makeGenerate(): Mock<GenerateFn> {
  return vi.fn<GenerateFn>(async (ctx, targets) =>
    targets.map(
      (target): TargetResult => ({
        target,
        path: path.join(ctx.cwd, ctx.config.output.dir, `${target}.ts`),
        outcome: 'written',
        count: 1,
      }),
    ),
  );
}

describe('parseArgs', () => {
  it('parses command and arguments', () => {
    const result = parseArgs(['node', 'adwaita-themegen', 'colors', 'extra']);
    expect(result.command).toBe('colors');
    expect(result.args).toEqual(['extra']);
  });

  it('parses --key=value options and boolean flags', () => {
    const result = parseArgs(['node', 'adwaita-themegen', 'icons', '--out-dir=gen', '--dry-run']);
    expect(result.options).toEqual({ 'out-dir': 'gen' });
    expect(result.flags).toEqual({ 'dry-run': true });
  });

  it('parses --key value options', () => {
    const result = parseArgs(['node', 'adwaita-themegen', 'generate', '--config', 'ci/themegen.yml']);
    expect(result.options.config).toBe('ci/themegen.yml');
  });

  it('does not consume the next argument after a boolean flag', () => {
    const result = parseArgs(['node', 'adwaita-themegen', '--json', 'colors']);
    expect(result.command).toBe('colors');
    expect(result.flags.json).toBe(true);
  });

  it('returns an empty command when none is given', () => {
    expect(parseArgs(['node', 'adwaita-themegen']).command).toBe('');
  });
});

describe('run', () => {
  it('prints global help without a command', async () => {
    const write = vi.fn();
    const generate = makeGenerate();

    const code = await run(['node', 'adwaita-themegen'], write, generate);

    expect(code).toBe(0);
    expect(write.mock.calls[0][0]).toMatch(/^Usage: adwaita-themegen <command> \[options\]/);
    expect(generate).not.toHaveBeenCalled();
  });

  it('prints command help for --help', async () => {
    const write = vi.fn();

    const code = await run(['node', 'adwaita-themegen', 'icons', '--help'], write, makeGenerate());

    expect(code).toBe(0);
    expect(write.mock.calls[0][0]).toMatch(/^SYNOPSIS\n  adwaita-themegen icons /);
  });

  it('rejects an unknown command with exit code 2', async () => {
    const write = vi.fn();

    const code = await run(['node', 'adwaita-themegen', 'paint'], write, makeGenerate());

    expect(code).toBe(2);
    expect(write).toHaveBeenCalledWith('Unknown command: paint. Run `adwaita-themegen help` for usage.');
  });

  it.each([
    ['generate', ['colors', 'icons']],
    ['colors', ['colors']],
    ['icons', ['icons']],
  ])('runs %s with targets %j', async (command, targets) => {
    const generate = makeGenerate();

    const code = await run(['node', 'adwaita-themegen', command], vi.fn(), generate);

    expect(code).toBe(0);
    expect(generate).toHaveBeenCalledWith(expect.anything(), targets);
  });

  it('passes --out-dir and --dry-run to the generator', async () => {
    const generate = makeGenerate();

    await run(['node', 'adwaita-themegen', 'colors', '--out-dir=lib/theme', '--dry-run'], vi.fn(), generate);

    const [ctx] = generate.mock.calls[0];
    expect(ctx.config.output.dir).toBe('lib/theme');
    expect(ctx.dryRun).toBe(true);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as child_process from 'child_process';
import fs from 'fs';
import path from 'path';
import { svgToPng, pngName } from '../../../src/layers/L2-mapper/svg-converter';

vi.mock('child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockedExecFileSync = child_process.execFileSync as unknown as ReturnType<typeof vi.fn>;

const OPTIONS = { command: 'inkscape', timeoutMs: 30_000 };

describe('pngName', () => {
  it('swaps the .svg extension', () => {
    expect(pngName('audio-x-generic.svg')).toBe('audio-x-generic.png');
    expect(pngName('/tmp/x/folder.svg')).toBe('/tmp/x/folder.png');
  });
});

describe('svgToPng', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the converter on a temp copy and returns the PNG bytes', () => {
    let seenSvg = '';
    mockedExecFileSync.mockImplementation((_cmd: string, args: string[]) => {
      const input = args[args.length - 1];
      seenSvg = fs.readFileSync(input, 'utf-8');
      fs.writeFileSync(input.replace(/\.svg$/, '.png'), 'PNGDATA');
      return Buffer.alloc(0);
    });

    const png = svgToPng(Buffer.from('<svg id="audio"/>'), 'audio-x-generic.svg', OPTIONS);

    expect(png.toString()).toBe('PNGDATA');
    expect(seenSvg).toBe('<svg id="audio"/>');
    const [cmd, args, opts] = mockedExecFileSync.mock.calls[0];
    expect(cmd).toBe('inkscape');
    expect(args.slice(0, 3)).toEqual(['--export-type=png', '--export-area-drawing', '--vacuum-defs']);
    expect(path.basename(args[3])).toBe('audio-x-generic.svg');
    expect(opts).toEqual({ timeout: 30_000, stdio: 'pipe' });
  });

  it('removes the temp directory afterwards', () => {
    let input = '';
    mockedExecFileSync.mockImplementation((_cmd: string, args: string[]) => {
      input = args[args.length - 1];
      fs.writeFileSync(input.replace(/\.svg$/, '.png'), 'PNGDATA');
      return Buffer.alloc(0);
    });

    svgToPng(Buffer.from('<svg/>'), 'folder.svg', OPTIONS);

    expect(input).not.toBe('');
    expect(fs.existsSync(path.dirname(input))).toBe(false);
  });

  it('reports a missing converter with THEMEGEN_E401', () => {
    mockedExecFileSync.mockImplementation(() => {
      throw Object.assign(new Error('spawnSync inkscape ENOENT'), { code: 'ENOENT' });
    });

    expect(() => svgToPng(Buffer.from('<svg/>'), 'folder.svg', OPTIONS)).toThrow(
      expect.objectContaining({ code: 'THEMEGEN_E401', message: 'Converter "inkscape" not found in PATH' }),
    );
  });

  it('reports a failing converter with THEMEGEN_E401', () => {
    mockedExecFileSync.mockImplementation(() => {
      throw new Error('Command failed: inkscape');
    });

    expect(() => svgToPng(Buffer.from('<svg/>'), 'folder.svg', OPTIONS)).toThrow(
      'Converter "inkscape" failed on folder.svg: Command failed: inkscape',
    );
  });

  it('reports a run that produced no PNG', () => {
    mockedExecFileSync.mockReturnValue(Buffer.alloc(0));

    expect(() => svgToPng(Buffer.from('<svg/>'), 'folder.svg', OPTIONS)).toThrow(
      'Converter "inkscape" produced no PNG for folder.svg',
    );
  });
});

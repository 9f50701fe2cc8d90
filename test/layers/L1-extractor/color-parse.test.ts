import { describe, it, expect } from 'vitest';
import { parseColor } from '../../../src/layers/L1-extractor/color-parse';

describe('parseColor', () => {
  it('parses #RRGGBB with an opaque alpha', () => {
    expect(parseColor('#3584e4')).toEqual({ r: 0x35, g: 0x84, b: 0xe4, a: 0xff });
  });

  it('parses #RRGGBBAA', () => {
    expect(parseColor('#00000080')).toEqual({ r: 0, g: 0, b: 0, a: 0x80 });
  });

  it('accepts upper-case hex digits', () => {
    expect(parseColor('#FAFAFA')).toEqual({ r: 0xfa, g: 0xfa, b: 0xfa, a: 0xff });
  });

  it('parses rgba() and truncates the alpha byte', () => {
    // 0.36 * 255 = 91.8
    expect(parseColor('rgba(0, 0, 0, 0.36)')).toEqual({ r: 0, g: 0, b: 0, a: 0x5b });
    // 0.07 * 255 = 17.85
    expect(parseColor('rgba(0, 0, 6, 0.07)')).toEqual({ r: 0, g: 0, b: 6, a: 17 });
  });

  it('parses rgba() with a full alpha and no spaces', () => {
    expect(parseColor('rgba(255,255,255,1)')).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });

  it('ignores surrounding whitespace', () => {
    expect(parseColor('  #ffffff\n')).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });

  it('rejects other formats with THEMEGEN_E301', () => {
    expect(() => parseColor('#fff')).toThrow(expect.objectContaining({ code: 'THEMEGEN_E301' }));
    expect(() => parseColor('rgb(1, 2, 3)')).toThrow(expect.objectContaining({ code: 'THEMEGEN_E301' }));
    expect(() => parseColor('transparent')).toThrow(expect.objectContaining({ code: 'THEMEGEN_E301' }));
  });

  it('rejects out-of-range channels and alpha', () => {
    expect(() => parseColor('rgba(256, 0, 0, 1)')).toThrow('channel out of range');
    expect(() => parseColor('rgba(0, 0, 0, 1.5)')).toThrow('alpha out of range');
  });
});

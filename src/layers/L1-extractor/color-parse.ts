import { ThemeGenError, type RGBA } from '../../shared/types';

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})?$/i;
const RGBA_COLOR = /^rgba\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d*\.?\d+)\s*\)$/;

function invalid(text: string, reason: string): ThemeGenError {
  return new ThemeGenError({
    code: 'THEMEGEN_E301',
    severity: 'high',
    message: `Cannot parse color "${text}": ${reason}`,
  });
}

/**
 * Parse a color as written on the named-colors page.
 *
 * Accepts `#RRGGBB`, `#RRGGBBAA` and `rgba(R, G, B, A)` where A is a
 * fraction in [0, 1]; the alpha byte is `trunc(A * 255)`.
 */
export function parseColor(text: string): RGBA {
  const value = text.trim();

  const hex = HEX_COLOR.exec(value);
  if (hex) {
    return {
      r: parseInt(hex[1], 16),
      g: parseInt(hex[2], 16),
      b: parseInt(hex[3], 16),
      a: hex[4] !== undefined ? parseInt(hex[4], 16) : 0xff,
    };
  }

  const rgba = RGBA_COLOR.exec(value);
  if (!rgba) {
    throw invalid(value, 'expected #RRGGBB, #RRGGBBAA or rgba(r, g, b, a)');
  }

  const [r, g, b] = [rgba[1], rgba[2], rgba[3]].map((c) => parseInt(c, 10));
  if ([r, g, b].some((c) => c > 255)) {
    throw invalid(value, 'channel out of range');
  }
  const alpha = parseFloat(rgba[4]);
  if (alpha > 1) {
    throw invalid(value, 'alpha out of range');
  }

  return { r, g, b, a: Math.trunc(alpha * 255) };
}

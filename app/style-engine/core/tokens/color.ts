/**
 * Color Parsing
 *
 * Accepts the color syntaxes the toolkit's style sheets understand:
 * - `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`
 * - `rgb()` / `rgba()`
 * - `hsl()` / `hsla()`
 * - `transparent` and the basic named colors
 */

// =============================================================================
// Types
// =============================================================================

/** Channels are 0-255, alpha 0-1 */
export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

// =============================================================================
// Constants
// =============================================================================

const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '#000000',
  white: '#ffffff',
  red: '#ff0000',
  green: '#008000',
  blue: '#0000ff',
  yellow: '#ffff00',
  cyan: '#00ffff',
  magenta: '#ff00ff',
  gray: '#808080',
  grey: '#808080',
  orange: '#ffa500',
  purple: '#800080',
  pink: '#ffc0cb',
  brown: '#a52a2a',
  navy: '#000080',
  silver: '#c0c0c0',
};

const HEX_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{4}|[0-9a-f]{6}|[0-9a-f]{8})$/;
const RGB_PATTERN =
  /^rgba?\(\s*([0-9.]+)\s*,\s*([0-9.]+)\s*,\s*([0-9.]+)\s*(?:,\s*([0-9.]+%?)\s*)?\)$/;
const HSL_PATTERN =
  /^hsla?\(\s*(-?[0-9.]+)(?:deg)?\s*,\s*([0-9.]+)%\s*,\s*([0-9.]+)%\s*(?:,\s*([0-9.]+%?)\s*)?\)$/;

// =============================================================================
// Helpers
// =============================================================================

function clampByte(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.min(255, Math.round(n)));
}

function toHexByte(n: number): string {
  return clampByte(n).toString(16).padStart(2, '0');
}

function parseAlpha(raw: string | undefined): number | null {
  if (raw === undefined) return 1;
  const percent = raw.endsWith('%');
  const n = Number(percent ? raw.slice(0, -1) : raw);
  if (!Number.isFinite(n)) return null;
  const alpha = percent ? n / 100 : n;
  return alpha >= 0 && alpha <= 1 ? alpha : null;
}

function parseHex(v: string): RgbaColor | null {
  if (!HEX_PATTERN.test(v)) return null;
  const digits = v.slice(1);
  const expanded =
    digits.length <= 4
      ? digits
          .split('')
          .map((d) => d + d)
          .join('')
      : digits;
  const byte = (i: number) => parseInt(expanded.slice(i * 2, i * 2 + 2), 16);
  return {
    r: byte(0),
    g: byte(1),
    b: byte(2),
    a: expanded.length === 8 ? byte(3) / 255 : 1,
  };
}

function hueToChannel(p: number, q: number, t: number): number {
  let h = t;
  if (h < 0) h += 1;
  if (h > 1) h -= 1;
  if (h < 1 / 6) return p + (q - p) * 6 * h;
  if (h < 1 / 2) return q;
  if (h < 2 / 3) return p + (q - p) * (2 / 3 - h) * 6;
  return p;
}

function hslToRgb(hue: number, saturation: number, lightness: number): [number, number, number] {
  const h = (((hue % 360) + 360) % 360) / 360;
  const s = Math.min(1, saturation / 100);
  const l = Math.min(1, lightness / 100);
  if (s === 0) return [l * 255, l * 255, l * 255];
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return [
    hueToChannel(p, q, h + 1 / 3) * 255,
    hueToChannel(p, q, h) * 255,
    hueToChannel(p, q, h - 1 / 3) * 255,
  ];
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a color string. Returns null when the syntax is not recognized.
 */
export function parseColor(raw: string): RgbaColor | null {
  const v = raw.trim().toLowerCase();
  if (!v) return null;

  if (v === 'transparent') return { r: 0, g: 0, b: 0, a: 0 };

  const named = NAMED_COLORS[v];
  if (named) return parseHex(named);

  if (v.startsWith('#')) return parseHex(v);

  const rgb = v.match(RGB_PATTERN);
  if (rgb) {
    const channels = [Number(rgb[1]), Number(rgb[2]), Number(rgb[3])];
    if (channels.some((c) => !Number.isFinite(c) || c > 255)) return null;
    const a = parseAlpha(rgb[4]);
    if (a === null) return null;
    return { r: channels[0] ?? 0, g: channels[1] ?? 0, b: channels[2] ?? 0, a };
  }

  const hsl = v.match(HSL_PATTERN);
  if (hsl) {
    const a = parseAlpha(hsl[4]);
    if (a === null) return null;
    const [r, g, b] = hslToRgb(Number(hsl[1]), Number(hsl[2]), Number(hsl[3]));
    return { r: clampByte(r), g: clampByte(g), b: clampByte(b), a };
  }

  return null;
}

export function isColor(raw: string): boolean {
  return parseColor(raw) !== null;
}

/** `#rrggbb`, alpha dropped */
export function toHex(color: RgbaColor): string {
  return `#${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}`;
}

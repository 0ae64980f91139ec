/**
 * Built-in token tables.
 * Color palettes live in `default-colors.json`.
 */

import type { TokenTables } from '../types';
import DEFAULT_COLORS from './default-colors.json';

export { DEFAULT_COLORS };

export const DEFAULT_SPACING = {
  xxs: 4,
  xs: 8,
  sm: 12,
  md: 16,
  lg: 24,
  xl: 32,
  xxl: 40,
} as const;

export const DEFAULT_RADIUS = {
  xs: 2,
  sm: 4,
  md: 6,
  lg: 8,
  xl: 12,
  xxl: 16,
} as const;

export const DEFAULT_FONT_SIZES = {
  xs: 12,
  sm: 14,
  md: 16,
  lg: 18,
  xl: 20,
  xxl: 24,
  xxxl: 32,
} as const;

export const DEFAULT_LINE_HEIGHTS = {
  xs: 1,
  sm: 1.25,
  md: 1.5,
  lg: 1.75,
  xl: 2,
} as const;

export const DEFAULT_FONT_WEIGHTS = {
  light: 300,
  normal: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
  extrabold: 800,
} as const;

export const DEFAULT_SHADOWS = {
  none: 'none',
  sm: '0 1px 3px rgba(0, 0, 0, 0.05)',
  md: '0 4px 6px rgba(0, 0, 0, 0.07)',
  lg: '0 10px 15px rgba(0, 0, 0, 0.1)',
  xl: '0 20px 25px rgba(0, 0, 0, 0.1)',
  inner: 'inset 0 2px 4px rgba(0, 0, 0, 0.06)',
} as const;

export const DEFAULT_FONT_FAMILIES = {
  sans: '-apple-system, BlinkMacSystemFont, Segoe UI, Roboto, Helvetica, Arial, sans-serif',
  mono: 'ui-monospace, SFMono-Regular, Menlo, Consolas, Liberation Mono, monospace',
} as const;

export const DEFAULT_BREAKPOINTS = {
  sm: 576,
  md: 768,
  lg: 992,
  xl: 1200,
} as const;

export const DEFAULT_TOKEN_TABLES: TokenTables = {
  colors: DEFAULT_COLORS,
  spacing: DEFAULT_SPACING,
  radius: DEFAULT_RADIUS,
  fontSizes: DEFAULT_FONT_SIZES,
  lineHeights: DEFAULT_LINE_HEIGHTS,
  fontWeights: DEFAULT_FONT_WEIGHTS,
  shadows: DEFAULT_SHADOWS,
  fontFamilies: DEFAULT_FONT_FAMILIES,
  breakpoints: DEFAULT_BREAKPOINTS,
};

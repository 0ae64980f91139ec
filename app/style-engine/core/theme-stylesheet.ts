/**
 * Application-wide style sheet derived from the active theme.
 *
 * Covers the base widget font and colors, focus rings, the `primary`
 * button class and `h1`-`h6` heading labels. Per-widget artifacts are
 * layered on top by the toolkit.
 */

import { BASE_BREAKPOINT } from 'facet-shared';

import type { PropBag, SelectorScope, ThemeHandle } from './types';
import type { PropNormalizer } from './prop-normalizer';
import { serialize } from './stylesheet-generator';

interface GlobalRule {
  selector: string;
  props: PropBag;
}

/** Heading font sizes (px, before scaling) and weights */
const HEADINGS = [
  { level: 1, fz: 32, fw: 'bold' },
  { level: 2, fz: 28, fw: 'bold' },
  { level: 3, fz: 24, fw: 'semibold' },
  { level: 4, fz: 20, fw: 'semibold' },
  { level: 5, fz: 18, fw: 'semibold' },
  { level: 6, fz: 16, fw: 'semibold' },
] as const;

function globalRules(handle: ThemeHandle): GlobalRule[] {
  return [
    {
      selector: 'QWidget',
      props: { ff: handle.theme.fontFamily, fz: 'md', c: 'text' },
    },
    {
      selector: 'QMainWindow',
      props: { bg: 'body' },
    },
    {
      selector: 'QLineEdit',
      props: { bd: '1px solid default-border', bdrs: 'sm', ':focus': { bdc: 'primary' } },
    },
    {
      selector: 'QPushButton[class="primary"]',
      props: {
        bg: 'primary',
        c: '#ffffff',
        bd: 'none',
        bdrs: 'sm',
        py: 'xs',
        px: 'md',
        ':hover': { bg: 'primary.7' },
        ':active': { bg: 'primary.8' },
        ':disabled': { bg: 'disabled', c: 'disabled-color' },
      },
    },
    ...HEADINGS.map(({ level, fz, fw }) => ({
      selector: `QLabel[class="h${level}"]`,
      props: { fz, fw },
    })),
  ];
}

/**
 * Serialize the global rules for `handle`.
 * Rules are resolved at the `base` breakpoint.
 *
 * @throws SerializationError when a theme value cannot be emitted
 */
export function generateThemeStyleSheet(handle: ThemeHandle, normalizer: PropNormalizer): string {
  return globalRules(handle)
    .map(({ selector, props }) => {
      const scope: SelectorScope = { root: selector };
      return serialize(normalizer.normalize(props, { handle, breakpoint: BASE_BREAKPOINT }), scope);
    })
    .filter((text) => text.length > 0)
    .join('\n\n');
}

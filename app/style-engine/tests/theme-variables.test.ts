/**
 * Unit tests for theme variable tables
 *
 * Tests cover:
 * - color, semantic, typography and layout variables per scheme
 * - responsive component variables per breakpoint
 * - breakpoint ranges, validation and filtering
 */

import { describe, expect, it } from 'vitest';

import { createTheme, createThemeHandle } from '@/core/theme';
import {
  breakpointRanges,
  createThemeVariables,
  filterThemeVariables,
  validateThemeVariables,
} from '@/core/theme-variables';

// =============================================================================
// Test Setup
// =============================================================================

const light = createThemeHandle(createTheme(), 1);
const dark = createThemeHandle(createTheme({ colorScheme: 'dark' }), 1);

const themed = createThemeHandle(
  createTheme({
    components: {
      button: { defaultProps: { bdrs: 'xl', p: { base: 'xs', md: 'lg' }, ':hover': { bg: 'blue.7' } } },
    },
  }),
  1,
);

// =============================================================================
// Variable Table
// =============================================================================

describe('theme-variables: createThemeVariables', () => {
  it('lists core and color variables', () => {
    const vars = createThemeVariables(light);
    expect(vars['--facet-scale']).toBe('1');
    expect(vars['--facet-color-scheme']).toBe('light');
    expect(vars['--facet-breakpoint']).toBe('base');
    expect(vars['--facet-color-blue-6']).toBe('#228be6');
    expect(vars['--facet-primary-color-7']).toBe('#1c7ed6');
    expect(vars['--facet-primary-color-filled']).toBe('#228be6');
  });

  it('resolves semantic colors for the active scheme', () => {
    expect(createThemeVariables(light)['--facet-color-error']).toBe('#fa5252');
    expect(createThemeVariables(light)['--facet-color-text']).toBe('#000000');

    const vars = createThemeVariables(dark);
    expect(vars['--facet-color-text']).toBe('#c9c9c9');
    expect(vars['--facet-color-body']).toBe('#242424');
    expect(vars['--facet-primary-color-filled']).toBe('#1971c2');
  });

  it('lists typography and layout tokens', () => {
    const vars = createThemeVariables(light);
    expect(vars['--facet-font-size-md']).toBe('16px');
    expect(vars['--facet-line-height-sm']).toBe('1.25');
    expect(vars['--facet-font-weight-bold']).toBe('700');
    expect(vars['--facet-radius-sm']).toBe('4px');
    expect(vars['--facet-shadow-sm']).toBe('0 1px 3px rgba(0, 0, 0, 0.05)');
    expect(vars['--facet-breakpoint-md']).toBe('768px');
  });

  it('scales lengths by the theme scale', () => {
    const vars = createThemeVariables(createThemeHandle(createTheme({ scale: 2 }), 1));
    expect(vars['--facet-scale']).toBe('2');
    expect(vars['--facet-spacing-md']).toBe('32px');
    expect(vars['--facet-font-size-md']).toBe('32px');
  });

  it('resolves component default props at the breakpoint', () => {
    const base = createThemeVariables(themed);
    expect(base['--facet-button-border-radius']).toBe('12px');
    expect(base['--facet-button-padding']).toBe('8px');
    expect(base['--facet-button-hover-background-color']).toBe('#1c7ed6');

    expect(createThemeVariables(themed, { breakpoint: 'lg' })['--facet-button-padding']).toBe('24px');
  });

  it('returns a frozen table', () => {
    expect(Object.isFrozen(createThemeVariables(light))).toBe(true);
  });
});

// =============================================================================
// Ranges, Validation and Filtering
// =============================================================================

describe('theme-variables: breakpointRanges', () => {
  it('covers every width from zero', () => {
    expect(breakpointRanges(light)).toEqual([
      { name: 'base', minWidth: 0, maxWidth: 575 },
      { name: 'sm', minWidth: 576, maxWidth: 767 },
      { name: 'md', minWidth: 768, maxWidth: 991 },
      { name: 'lg', minWidth: 992, maxWidth: 1199 },
      { name: 'xl', minWidth: 1200 },
    ]);
  });
});

describe('theme-variables: validateThemeVariables', () => {
  it('accepts a generated table', () => {
    expect(validateThemeVariables(createThemeVariables(themed))).toEqual([]);
  });

  it('reports foreign names and unsafe values', () => {
    expect(validateThemeVariables({ '--other-x': 'red', '--facet-bad': 'red; color: blue' })).toEqual([
      '--other-x: invalid variable name',
      'Value for "--facet-bad" contains style-sheet syntax',
    ]);
  });
});

describe('theme-variables: filterThemeVariables', () => {
  it('matches substrings', () => {
    expect(filterThemeVariables(createThemeVariables(light), '--facet-spacing-')).toEqual({
      '--facet-spacing-xxs': '4px',
      '--facet-spacing-xs': '8px',
      '--facet-spacing-sm': '12px',
      '--facet-spacing-md': '16px',
      '--facet-spacing-lg': '24px',
      '--facet-spacing-xl': '32px',
      '--facet-spacing-xxl': '40px',
    });
  });

  it('matches regular expressions', () => {
    const reds = filterThemeVariables(createThemeVariables(light), /^--facet-color-red-\d$/);
    expect(Object.keys(reds)).toHaveLength(10);
    expect(reds['--facet-color-red-6']).toBe('#fa5252');
  });
});

/**
 * Unit tests for the Value Resolver
 *
 * Tests cover:
 * - length tokens, bare numbers, rem and negation
 * - color references, semantic aliases and scheme handling
 * - responsive selection and its failure modes
 * - idempotence of resolved output
 */

import { describe, expect, it } from 'vitest';

import { ConfigError, LookupError, SerializationError } from '@/core/errors';
import { createTheme, createThemeHandle } from '@/core/theme';
import type { PropValue, ThemeHandle, ValueKind } from '@/core/types';
import {
  createValueResolver,
  formatNumber,
  selectResponsive,
  toResponsive,
} from '@/core/value-resolver';

// =============================================================================
// Test Setup
// =============================================================================

function handleFor(override: unknown = {}): ThemeHandle {
  return createThemeHandle(createTheme(override), 1);
}

const light = handleFor();
const dark = handleFor({ colorScheme: 'dark' });
const resolver = createValueResolver();

function resolve(raw: PropValue, kind: ValueKind, handle: ThemeHandle = light, breakpoint = 'base'): string {
  return resolver.resolve(raw, { handle, kind, breakpoint });
}

// =============================================================================
// Lengths
// =============================================================================

describe('value-resolver: lengths', () => {
  it('resolves named spacing keys to px', () => {
    expect(resolve('md', 'spacing')).toBe('16px');
    expect(resolve('xxs', 'size')).toBe('4px');
  });

  it('treats bare numbers as px', () => {
    expect(resolve(10, 'spacing')).toBe('10px');
    expect(resolve('12', 'size')).toBe('12px');
  });

  it('negates named keys with a leading minus', () => {
    expect(resolve('-md', 'spacing')).toBe('-16px');
  });

  it('converts rem using 16px per rem', () => {
    expect(resolve('1.5rem', 'size')).toBe('24px');
  });

  it('passes values with other units through', () => {
    expect(resolve('50%', 'size')).toBe('50%');
    expect(resolve('auto', 'spacing')).toBe('auto');
  });

  it('applies the theme scale to every physical length', () => {
    const scaled = handleFor({ scale: 2 });
    expect(resolve('md', 'spacing', scaled)).toBe('32px');
    expect(resolve(5, 'size', scaled)).toBe('10px');
    expect(resolve('1rem', 'size', scaled)).toBe('32px');
  });

  it('resolves radius and font-size tables', () => {
    expect(resolve('sm', 'radius')).toBe('4px');
    expect(resolve('lg', 'font-size')).toBe('18px');
  });
});

// =============================================================================
// Colors
// =============================================================================

describe('value-resolver: colors', () => {
  it('resolves family.shade references', () => {
    expect(resolve('blue.6', 'color')).toBe('#228be6');
  });

  it('resolves primary references through the primary family', () => {
    expect(resolve('primary', 'color')).toBe('#228be6');
    expect(resolve('primary.2', 'color')).toBe('#a5d8ff');
  });

  it('uses the scheme primary shade for bare family names', () => {
    expect(resolve('red', 'color')).toBe('#fa5252');
    expect(resolve('red', 'color', dark)).toBe('#e03131');
  });

  it('resolves semantic aliases per scheme', () => {
    expect(resolve('dimmed', 'color')).toBe('#868e96');
    expect(resolve('dimmed', 'color', dark)).toBe('#828282');
    expect(resolve('text', 'color')).toBe('#000000');
    expect(resolve('anchor', 'color', dark)).toBe('#4dabf7');
  });

  it('passes literal colors through', () => {
    expect(resolve('#ff0000', 'color')).toBe('#ff0000');
    expect(resolve('white', 'color')).toBe('white');
  });

  it('throws LookupError for unknown families and indices', () => {
    expect(() => resolve('mauve.3', 'color')).toThrow(LookupError);
    expect(() => resolve('blue.12', 'color')).toThrow(LookupError);
  });

  it('resolves border widths and colors word by word', () => {
    expect(resolve('1px solid blue.6', 'border')).toBe('1px solid #228be6');
    expect(resolve('2 solid red', 'border')).toBe('2px solid #fa5252');
    expect(resolve(2, 'border')).toBe('2px');
  });
});

// =============================================================================
// Other Kinds
// =============================================================================

describe('value-resolver: typography and literals', () => {
  it('keeps line-height and font-weight unitless', () => {
    expect(resolve('md', 'line-height')).toBe('1.5');
    expect(resolve(1.4, 'line-height')).toBe('1.4');
    expect(resolve('bold', 'font-weight')).toBe('700');
  });

  it('resolves shadow and font family keys', () => {
    expect(resolve('sm', 'shadow')).toBe('0 1px 3px rgba(0, 0, 0, 0.05)');
    expect(resolve('Inter', 'font-family')).toBe('Inter');
  });

  it('passes literals through trimmed', () => {
    expect(resolve('  center ', 'literal')).toBe('center');
  });

  it('rejects empty strings with ConfigError', () => {
    expect(() => resolve('   ', 'literal')).toThrow(ConfigError);
  });

  it('rejects non-finite numbers with SerializationError', () => {
    expect(() => resolve(Number.POSITIVE_INFINITY, 'size')).toThrow(SerializationError);
  });
});

// =============================================================================
// Responsive Values
// =============================================================================

describe('value-resolver: responsive values', () => {
  it('falls back to base when the active breakpoint has no entry', () => {
    expect(resolve({ base: 10 }, 'spacing', light, 'sm')).toBe('10px');
  });

  it('uses the nearest smaller breakpoint', () => {
    expect(resolve({ base: 100, lg: 300 }, 'size', light, 'xl')).toBe('300px');
    expect(resolve({ base: 100, lg: 300 }, 'size', light, 'md')).toBe('100px');
  });

  it('throws ConfigError when nothing at or below is defined', () => {
    expect(() => resolve({ sm: 5 }, 'size', light, 'base')).toThrow(ConfigError);
  });

  it('throws LookupError for keys that are not breakpoints', () => {
    expect(() => resolve({ base: 1, huge: 2 }, 'size', light, 'sm')).toThrow(LookupError);
  });

  it('throws LookupError for an unknown active breakpoint', () => {
    expect(() => resolve({ base: 1 }, 'size', light, 'tablet')).toThrow(LookupError);
  });

  it('selects directly from an explicit order', () => {
    expect(selectResponsive({ base: 'a', md: 'b' }, 'lg', ['base', 'sm', 'md', 'lg'])).toBe('b');
  });

  it('wraps scalars as base-only maps', () => {
    expect(toResponsive(5)).toEqual({ base: 5 });
    expect(toResponsive({ sm: 1 })).toEqual({ sm: 1 });
  });
});

// =============================================================================
// Idempotence and Formatting
// =============================================================================

describe('value-resolver: idempotence', () => {
  const cases: Array<[PropValue, ValueKind]> = [
    ['md', 'spacing'],
    ['-md', 'spacing'],
    ['1.5rem', 'size'],
    ['blue.6', 'color'],
    ['red', 'color'],
    ['dimmed', 'color'],
    ['1px solid primary', 'border'],
    ['lg', 'font-size'],
    ['md', 'line-height'],
    ['semibold', 'font-weight'],
    ['md', 'shadow'],
    ['sans', 'font-family'],
  ];

  it.each(cases)('resolving %s (%s) twice yields the same value', (raw, kind) => {
    const once = resolve(raw, kind, dark);
    expect(resolve(once, kind, dark)).toBe(once);
  });
});

describe('value-resolver: formatNumber', () => {
  it('trims floating point noise', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
  });

  it('never emits negative zero', () => {
    expect(formatNumber(-0)).toBe('0');
  });
});

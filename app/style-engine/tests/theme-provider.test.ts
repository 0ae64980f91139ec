/**
 * Unit tests for the Theme Provider
 *
 * Tests cover:
 * - resolve-and-apply with caching
 * - theme changes: validation, no-op detection, regeneration order
 * - breakpoint crossings scoped to one window
 * - recoverable serialization failures
 * - window, widget and provider lifecycle
 *
 * The host toolkit is replaced by in-process fakes.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { LookupError, ValidationError } from '@/core/errors';
import { createTheme } from '@/core/theme';
import { createThemeProvider, type ThemeProviderOptions } from '@/core/theme-provider';

import { createFakeApplication, createFakeWidget, createFakeWindow, createTestLogger } from './test-utils/host';

// =============================================================================
// Test Setup
// =============================================================================

const BREAKPOINTS = { sm: 480, lg: 1024 };

function setup(options: ThemeProviderOptions = {}) {
  const logger = createTestLogger();
  const application = createFakeApplication();
  const provider = createThemeProvider({
    override: { breakpoints: BREAKPOINTS },
    logger,
    application,
    ...options,
  });
  return { provider, logger, application };
}

afterEach(() => {
  vi.useRealTimers();
});

// =============================================================================
// Resolve and Apply
// =============================================================================

describe('theme-provider: resolveAndApply', () => {
  it('resolves tokens and responsive values for the window breakpoint', () => {
    const { provider } = setup();
    const window = createFakeWindow('main', 1100);
    const widget = createFakeWidget('card', window);

    const artifact = provider.resolveAndApply(widget, { m: 'md', c: 'blue.6', w: { base: 100, lg: 300 } });

    expect(provider.getActiveBreakpoint('main')).toBe('lg');
    expect(widget.sheets).toEqual(['QWidget#card {\n  color: #228be6;\n  margin: 16px;\n  width: 300px;\n}']);
    expect(artifact?.text).toBe(widget.sheets[0]);
  });

  it('moves a widget to another window and keeps its subscriptions', () => {
    const { provider } = setup();
    const first = createFakeWindow('first', 1100);
    const second = createFakeWindow('second', 600);
    const listener = vi.fn();
    provider.resolveAndApply(createFakeWidget('card', first), { w: { base: 100, lg: 300 } });
    provider.subscribe(createFakeWidget('card', first), listener);

    const moved = createFakeWidget('card', second);
    provider.resolveAndApply(moved, { w: { base: 100, lg: 300 } });
    first.close();

    expect(moved.sheets).toEqual(['QWidget#card {\n  width: 100px;\n}']);
    expect(provider.getStats()).toMatchObject({ widgets: 1, windows: 1 });

    provider.setColorScheme('dark');
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('reuses the cached artifact for an unchanged bag', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));

    provider.resolveAndApply(widget, { c: 'blue.6' });
    provider.resolveAndApply(widget, { c: 'blue.6' });

    expect(widget.sheets).toHaveLength(1);
    expect(provider.getStats()).toMatchObject({ regenerations: 1, cacheHits: 1, cacheMisses: 1, widgets: 1 });
  });

  it('styles component defaults and inner targets', () => {
    const { provider } = setup();
    const widget = createFakeWidget('save', createFakeWindow('main', 800), {
      selector: 'QPushButton#save',
      targets: { label: 'QLabel' },
      component: 'button',
    });

    const artifact = provider.resolveAndApply(widget, { styles: { label: { fw: 'bold' } } });

    expect(artifact?.selectors).toEqual([
      'QPushButton#save',
      'QPushButton#save QLabel',
      'QPushButton#save:disabled',
      'QPushButton#save:hover',
    ]);
  });

  it('keeps the previous style sheet when serialization fails', () => {
    const onDiagnostic = vi.fn();
    const { provider, logger } = setup({ onDiagnostic });
    const widget = createFakeWidget('card', createFakeWindow('main', 800));

    provider.resolveAndApply(widget, { c: 'blue.6' });
    const result = provider.resolveAndApply(widget, { ta: 'left; color: red' });

    expect(result).toBeNull();
    expect(widget.sheets).toEqual(['QWidget#card {\n  color: #228be6;\n}']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(onDiagnostic).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'SERIALIZATION', path: 'ta', widgetId: 'card' }),
    );
  });

  it('fails fast on unknown tokens and does not track the widget', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));

    expect(() => provider.resolveAndApply(widget, { c: 'mauve.2' })).toThrow(LookupError);
    expect(provider.getStats().widgets).toBe(0);
    expect(widget.sheets).toEqual([]);
  });

  it('reports non-fatal prop problems through the diagnostic hook', () => {
    const onDiagnostic = vi.fn();
    const { provider } = setup({ onDiagnostic });
    const widget = createFakeWidget('card', createFakeWindow('main', 300));

    provider.resolveAndApply(widget, { m: { lg: 'md' }, c: 'blue.6' });

    expect(widget.sheets).toEqual(['QWidget#card {\n  color: #228be6;\n}']);
    expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({ code: 'CONFIG', path: 'm', widgetId: 'card' }));
  });
});

// =============================================================================
// Theme Changes
// =============================================================================

describe('theme-provider: theme changes', () => {
  it('starts at version 1 and publishes the application style sheet', () => {
    const { provider, application } = setup();

    expect(provider.getVersion()).toBe(1);
    expect(application.sheets).toHaveLength(1);
    expect(application.sheets[0]?.startsWith('QWidget {\n  color: #000000;\n')).toBe(true);
    expect(application.sheets[0]).toContain('QLabel[class="h1"] {\n  font-size: 32px;\n  font-weight: 700;\n}');
  });

  it('treats re-applying an unchanged theme as a no-op', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    provider.resolveAndApply(widget, { c: 'primary' });
    const before = provider.getStats();

    expect(provider.apply(provider.getTheme())).toBe(false);
    expect(provider.apply(createTheme({ breakpoints: BREAKPOINTS }))).toBe(false);

    expect(provider.getStats()).toEqual(before);
    expect(widget.sheets).toHaveLength(1);
  });

  it('regenerates tracked widgets before notifying subscribers', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    provider.resolveAndApply(widget, { c: 'text' });

    const seen: Array<string | undefined> = [];
    const listener = vi.fn(() => {
      seen.push(widget.sheets.at(-1));
    });
    provider.subscribe(widget, listener);

    expect(provider.setColorScheme('dark')).toBe(true);

    expect(listener).toHaveBeenCalledWith({ theme: provider.getTheme(), version: 2, previousVersion: 1 });
    expect(seen).toEqual(['QWidget#card {\n  color: #c9c9c9;\n}']);
    expect(provider.getStats().regenerations).toBe(2);
  });

  it('keeps the previous theme when a family has nine shades', () => {
    const { provider } = setup();
    const theme = provider.getTheme();
    const nine = theme.colors.blue?.slice(0, 9);

    expect(() => provider.update({ colors: { blue: nine } })).toThrow(ValidationError);
    expect(provider.getTheme()).toBe(theme);
    expect(provider.getVersion()).toBe(1);
  });

  it('keeps the previous theme when apply fails validation', () => {
    const { provider } = setup();
    const theme = provider.getTheme();

    expect(() => provider.apply({ ...theme, primaryColor: 'mauve' })).toThrow(LookupError);
    expect(provider.getTheme()).toBe(theme);
  });

  it('updates one family without touching others', () => {
    const { provider } = setup();
    const red = provider.getTheme().colors.red;
    const blue = ['#0a0a0a', '#1a1a1a', '#2a2a2a', '#3a3a3a', '#4a4a4a', '#5a5a5a', '#6a6a6a', '#7a7a7a', '#8a8a8a', '#9a9a9a'];

    provider.update({ colors: { blue } });

    expect(provider.getTheme().colors.blue).toEqual(blue);
    expect(provider.getTheme().colors.red).toBe(red);
    expect(provider.getHandle().tokens.get('red', 6)).toBe('#fa5252');
  });

  it('toggles the color scheme and republishes the application style sheet', () => {
    const { provider, application } = setup();

    expect(provider.toggleColorScheme()).toBe('dark');
    expect(application.sheets[1]).toContain('QMainWindow {\n  background-color: #242424;\n}');
    expect(provider.toggleColorScheme()).toBe('light');
    expect(provider.getVersion()).toBe(3);
  });

  it('restyles primary references when the primary color changes', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    provider.resolveAndApply(widget, { bg: 'primary' });

    expect(() => provider.setPrimaryColor('mauve')).toThrow(LookupError);
    provider.setPrimaryColor('teal');

    expect(widget.sheets).toEqual([
      'QWidget#card {\n  background-color: #228be6;\n}',
      'QWidget#card {\n  background-color: #12b886;\n}',
    ]);
  });

  it('routes family registration through a new theme version', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    const blue = ['#0a0a0a', '#1a1a1a', '#2a2a2a', '#3a3a3a', '#4a4a4a', '#5a5a5a', '#6a6a6a', '#7a7a7a', '#8a8a8a', '#9a9a9a'];
    provider.resolveAndApply(widget, { c: 'blue.6' });

    expect('register' in provider.getHandle().tokens).toBe(false);
    expect(provider.registerColorFamily('blue', blue)).toBe(true);

    expect(provider.getVersion()).toBe(2);
    expect(widget.sheets.at(-1)).toBe('QWidget#card {\n  color: #6a6a6a;\n}');

    provider.update({ scale: 2 });
    expect(provider.getHandle().tokens.get('blue', 6)).toBe('#6a6a6a');
  });

  it('ignores writes to a theme object after it was applied', () => {
    const { provider } = setup();
    const window = createFakeWindow('main', 800);
    const components = { card: { defaultProps: { c: 'red.6' } } };

    expect(provider.apply({ ...structuredClone(provider.getTheme()), components })).toBe(true);
    components.card.defaultProps.c = 'green.6';

    const first = createFakeWidget('first', window, { component: 'card' });
    const second = createFakeWidget('second', window, { component: 'card' });
    provider.resolveAndApply(first, {});
    provider.resolveAndApply(second, {});

    expect(provider.getVersion()).toBe(2);
    expect(Object.isFrozen(provider.getTheme().components)).toBe(true);
    expect(first.sheets).toEqual(['QWidget#first {\n  color: #fa5252;\n}']);
    expect(second.sheets).toEqual(['QWidget#second {\n  color: #fa5252;\n}']);
  });

  it('only subscribes tracked widgets', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    expect(() => provider.subscribe(widget, vi.fn())).toThrow(/not tracked/);

    provider.resolveAndApply(widget, { c: 'text' });
    const listener = vi.fn();
    const unsubscribe = provider.subscribe(widget, listener);
    unsubscribe();
    unsubscribe();
    provider.setColorScheme('dark');

    expect(listener).not.toHaveBeenCalled();
  });

  it('isolates failing subscribers', () => {
    const { provider, logger } = setup();
    const second = vi.fn();
    provider.onThemeChange(() => {
      throw new Error('boom');
    });
    provider.onThemeChange(second);

    provider.setColorScheme('dark');

    expect(second).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Contrast Audit
// =============================================================================

describe('theme-provider: contrast audit', () => {
  it('logs every shade below the minimum ratio', () => {
    const { logger } = setup({ auditContrast: { shades: [0], minRatio: 21 } });

    expect(logger.warn).toHaveBeenCalledTimes(14);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/Low contrast: blue\.0 \(#e7f5ff\) ratio /));
  });

  it('logs nothing when every shade passes', () => {
    const { logger } = setup({ auditContrast: { shades: [0], minRatio: 1 } });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('rejects out-of-range shade indices before any theme is installed', () => {
    try {
      setup({ auditContrast: { shades: [10] } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details?.issues).toEqual(['shades.0: Number must be less than or equal to 9']);
      }
    }
  });
});

// =============================================================================
// Preferences
// =============================================================================

describe('theme-provider: preference', () => {
  it('applies the stored scheme and primary color on start', () => {
    const { provider } = setup({ preference: { scheme: 'dark', primaryColor: 'teal' } });
    expect(provider.getTheme().colorScheme).toBe('dark');
    expect(provider.getTheme().primaryColor).toBe('teal');
    expect(provider.getVersion()).toBe(1);
  });

  it('rejects malformed preferences', () => {
    expect(() => setup({ preference: { scheme: 'sepia' } })).toThrow(ValidationError);
  });

  it('rejects preferences naming an unknown family', () => {
    expect(() => setup({ preference: { primaryColor: 'mauve' } })).toThrow(LookupError);
  });
});

// =============================================================================
// Breakpoints and Lifecycle
// =============================================================================

describe('theme-provider: breakpoints', () => {
  it('regenerates only the widgets of the window that crossed', () => {
    vi.useFakeTimers();
    const { provider } = setup();
    const first = createFakeWindow('w1', 300);
    const second = createFakeWindow('w2', 300);
    const a = createFakeWidget('a', first);
    const b = createFakeWidget('b', second);
    const onBreakpointChange = vi.fn();
    provider.onBreakpointChange(onBreakpointChange);

    provider.resolveAndApply(a, { w: { base: 100, sm: 200 } });
    provider.resolveAndApply(b, { w: { base: 100, sm: 200 } });

    first.resize(550);
    first.resize(600);
    vi.advanceTimersByTime(100);

    expect(a.sheets).toEqual(['QWidget#a {\n  width: 100px;\n}', 'QWidget#a {\n  width: 200px;\n}']);
    expect(b.sheets).toEqual(['QWidget#b {\n  width: 100px;\n}']);
    expect(onBreakpointChange).toHaveBeenCalledTimes(1);
    expect(onBreakpointChange).toHaveBeenCalledWith({ windowId: 'w1', previous: 'base', current: 'sm', width: 600 });
    expect(provider.getStats().regenerations).toBe(3);
  });

  it('does not regenerate for resizes inside a bucket', () => {
    vi.useFakeTimers();
    const { provider } = setup();
    const window = createFakeWindow('w1', 500);
    const widget = createFakeWidget('a', window);
    provider.resolveAndApply(widget, { w: { base: 100, sm: 200 } });

    window.resize(700);
    vi.advanceTimersByTime(100);

    expect(widget.sheets).toHaveLength(1);
    expect(provider.getStats().regenerations).toBe(1);
  });
});

describe('theme-provider: theme variables', () => {
  it('builds the table for a window breakpoint and rebuilds it after a theme change', () => {
    const { provider } = setup();
    provider.attachWindow(createFakeWindow('main', 1100));

    const vars = provider.getThemeVariables('main');
    expect(vars['--facet-breakpoint']).toBe('lg');
    expect(vars['--facet-color-scheme']).toBe('light');
    expect(provider.getThemeVariables('main')).toBe(vars);
    expect(provider.getThemeVariables()['--facet-breakpoint']).toBe('base');

    provider.setColorScheme('dark');
    expect(provider.getThemeVariables('main')['--facet-color-scheme']).toBe('dark');
  });
});

describe('theme-provider: lifecycle', () => {
  it('forgets a window and its widgets when it closes', () => {
    const { provider } = setup();
    const window = createFakeWindow('main', 800);
    provider.resolveAndApply(createFakeWidget('card', window), { c: 'blue.6' });

    window.close();

    expect(provider.getStats()).toMatchObject({ windows: 0, widgets: 0, cachedArtifacts: 0 });
    expect(window.listenerCount()).toBe(0);
  });

  it('stops restyling released widgets', () => {
    const { provider } = setup();
    const widget = createFakeWidget('card', createFakeWindow('main', 800));
    provider.resolveAndApply(widget, { c: 'text' });

    provider.release('card');
    provider.setColorScheme('dark');

    expect(widget.sheets).toHaveLength(1);
  });

  it('detaches every window on dispose', () => {
    const { provider } = setup();
    const window = createFakeWindow('main', 800);
    provider.resolveAndApply(createFakeWidget('card', window), { c: 'blue.6' });

    provider.dispose();

    expect(window.listenerCount()).toBe(0);
    expect(provider.getStats()).toMatchObject({ windows: 0, widgets: 0 });
    expect(() => provider.resolveAndApply(createFakeWidget('x', window), {})).toThrow(/disposed/);
  });
});

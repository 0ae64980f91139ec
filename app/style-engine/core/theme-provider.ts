/**
 * Theme Provider
 *
 * Owns the active theme and keeps every tracked widget's style sheet in
 * sync with it.
 *
 * Ordering guarantee for a theme change:
 *   validate -> bump version -> regenerate tracked widgets
 *   -> publish the application style sheet -> notify subscribers
 * A theme that fails validation leaves the previous one in place.
 *
 * Breakpoint crossings only touch the window that crossed: its cache
 * entries are dropped and its widgets regenerated.
 */

import { BASE_BREAKPOINT, parseThemePreference, type ColorScheme } from 'facet-shared';

import { DEFAULT_RESIZE_DEBOUNCE_MS, STYLE_ENGINE_LOG_PREFIX } from '../constants';
import { Disposer } from '../utils/disposables';
import { fingerprint } from '../utils/fingerprint';
import { createArtifactCache, type ArtifactCache } from './artifact-cache';
import { createComponentDefaultsRegistry, type ComponentDefaultsRegistry } from './component-defaults';
import { SerializationError, ValidationError, describeError, isStyleEngineError } from './errors';
import { createPropNormalizer } from './prop-normalizer';
import {
  createResponsiveContext,
  type BreakpointChangeEvent,
  type BreakpointChangeListener,
  type ResponsiveContext,
} from './responsive-context';
import { createArtifact } from './stylesheet-generator';
import {
  createTheme,
  createThemeHandle,
  freezeTheme,
  mergeTheme,
  parseThemeOverride,
  themeFingerprint,
  validateTheme,
} from './theme';
import { generateThemeStyleSheet } from './theme-stylesheet';
import { createThemeVariables, type ThemeVariables } from './theme-variables';
import { auditColorContrast, parseContrastAuditOptions, type ContrastAuditOptions } from './tokens/contrast';
import type {
  HostApplication,
  HostWindow,
  PropBag,
  StyleDiagnostic,
  StyleEngineLogger,
  StyleSheetArtifact,
  StyleTarget,
  Theme,
  ThemeHandle,
  Unsubscribe,
} from './types';

// =============================================================================
// Types
// =============================================================================

export interface ThemeChangeEvent {
  theme: Theme;
  version: number;
  previousVersion: number;
}

export type ThemeChangeListener = (event: ThemeChangeEvent) => void;

export interface ThemeProviderOptions {
  /** Initial override merged into the default theme (validated) */
  override?: unknown;
  /** Persisted `{ scheme, primaryColor }` record, applied on top of `override` */
  preference?: unknown;
  /** Receives the global style sheet on every theme change */
  application?: HostApplication;
  /**
   * Resize debounce per window.
   * @default 100
   */
  debounceMs?: number;
  /** @default console */
  logger?: StyleEngineLogger;
  /** Recoverable per-widget problems. Defaults to `logger.warn`. */
  onDiagnostic?: (diagnostic: StyleDiagnostic) => void;
  componentDefaults?: ComponentDefaultsRegistry;
  /** Log low-contrast shades after each theme change */
  auditContrast?: boolean | ContrastAuditOptions;
}

export interface ResolveOptions {
  /** Overrides `widget.component` */
  component?: string;
}

export interface ThemeProviderStats {
  version: number;
  regenerations: number;
  cacheHits: number;
  cacheMisses: number;
  cachedArtifacts: number;
  widgets: number;
  windows: number;
}

export interface ThemeProvider {
  getTheme(): Theme;
  getHandle(): ThemeHandle;
  getVersion(): number;

  /**
   * Install a complete theme.
   * @returns false when the theme's content equals the active one
   * @throws ValidationError / LookupError; the previous theme stays active
   */
  apply(theme: Theme): boolean;
  /** Deep-merge a partial override into the active theme, then apply */
  update(partial: unknown): boolean;
  /** Add or replace one color family as a new theme version */
  registerColorFamily(family: string, shades: readonly string[]): boolean;
  setColorScheme(scheme: ColorScheme): boolean;
  /** @returns the new scheme */
  toggleColorScheme(): ColorScheme;
  setPrimaryColor(family: string): boolean;

  /** Start tracking a window's width; idempotent */
  attachWindow(window: HostWindow): ResponsiveContext;
  detachWindow(windowId: string): void;
  getActiveBreakpoint(windowId: string): string;
  /** Resolved variable table for the active theme at a window's breakpoint (`base` without one) */
  getThemeVariables(windowId?: string): ThemeVariables;

  /**
   * Resolve `bag` for `widget`, apply the style sheet and track the widget
   * for later theme and breakpoint changes.
   *
   * @returns the applied artifact, or null when serialization failed and
   * the previous style sheet was kept
   * @throws ValidationError / LookupError
   */
  resolveAndApply(widget: StyleTarget, bag: PropBag, options?: ResolveOptions): StyleSheetArtifact | null;
  /** Stop tracking a widget */
  release(widgetId: string): void;

  /**
   * Notified after the widget's style sheet was regenerated for a new theme.
   * @throws Error when the widget is not tracked
   */
  subscribe(widget: StyleTarget, listener: ThemeChangeListener): Unsubscribe;
  /** Notified after every theme change */
  onThemeChange(listener: ThemeChangeListener): Unsubscribe;
  onBreakpointChange(listener: BreakpointChangeListener): Unsubscribe;

  getStats(): ThemeProviderStats;
  dispose(): void;
}

interface TrackedWidget {
  target: StyleTarget;
  bag: PropBag;
  component?: string;
  fingerprint: string;
  /** Hash of the text last handed to the widget */
  appliedHash: string | null;
}

interface WindowRecord {
  window: HostWindow;
  context: ResponsiveContext;
  disposer: Disposer;
  widgets: Set<string>;
}

// =============================================================================
// Helpers
// =============================================================================

function preferenceOverride(preference: unknown): { colorScheme: ColorScheme; primaryColor: string } {
  const parsed = parseThemePreference(preference);
  if (!parsed.ok) {
    throw new ValidationError(`Invalid theme preference: ${parsed.issues.join('; ')}`, {
      issues: parsed.issues,
    });
  }
  return { colorScheme: parsed.value.scheme, primaryColor: parsed.value.primaryColor };
}

// =============================================================================
// Implementation
// =============================================================================

export function createThemeProvider(options: ThemeProviderOptions = {}): ThemeProvider {
  const logger = options.logger ?? console;
  const debounceMs = options.debounceMs ?? DEFAULT_RESIZE_DEBOUNCE_MS;
  const normalizer = createPropNormalizer({
    defaults: options.componentDefaults ?? createComponentDefaultsRegistry(),
  });
  const cache: ArtifactCache = createArtifactCache();

  const widgets = new Map<string, TrackedWidget>();
  const windows = new Map<string, WindowRecord>();
  const widgetListeners = new Map<string, Set<ThemeChangeListener>>();
  const themeListeners = new Set<ThemeChangeListener>();
  const breakpointListeners = new Set<BreakpointChangeListener>();

  const auditOptions =
    options.auditContrast === true
      ? {}
      : options.auditContrast
        ? parseContrastAuditOptions(options.auditContrast)
        : undefined;

  /** Keyed by breakpoint; cleared on every theme change */
  const variableTables = new Map<string, ThemeVariables>();

  let regenerations = 0;
  let disposed = false;

  let initialTheme = createTheme(options.override ?? {});
  if (options.preference !== undefined) {
    initialTheme = mergeTheme(initialTheme, preferenceOverride(options.preference));
  }
  let handle: ThemeHandle = createThemeHandle(initialTheme, 0);
  let themeKey = '';

  // ===========================================================================
  // Notification
  // ===========================================================================

  function safeCall<T>(listener: (event: T) => void, event: T, label: string): void {
    try {
      listener(event);
    } catch (error) {
      logger.warn(`${STYLE_ENGINE_LOG_PREFIX} ${label} listener failed:`, error);
    }
  }

  function report(widgetId: string, diagnostic: StyleDiagnostic): void {
    const full = { ...diagnostic, widgetId };
    if (options.onDiagnostic) {
      options.onDiagnostic(full);
      return;
    }
    const where = full.path ? ` (${full.path})` : '';
    logger.warn(`${STYLE_ENGINE_LOG_PREFIX} ${widgetId}${where}: ${full.message}`);
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  function assertActive(): void {
    if (disposed) throw new Error(`${STYLE_ENGINE_LOG_PREFIX} Theme provider is disposed`);
  }

  /**
   * Produce and apply the artifact for a widget record.
   * Returns null when serialization failed (previous text kept).
   */
  function render(record: TrackedWidget, windowRecord: WindowRecord): StyleSheetArtifact | null {
    const { target } = record;
    const breakpoint = windowRecord.context.getActiveBreakpoint();
    const key = cache.computeKey({
      widgetId: target.id,
      breakpoint,
      themeVersion: handle.version,
      fingerprint: record.fingerprint,
    });

    let artifact = cache.get(windowRecord.window.id, target.id, key);
    if (!artifact) {
      try {
        const declarations = normalizer.normalize(record.bag, {
          handle,
          breakpoint,
          component: record.component,
          targets: Object.keys(target.targets ?? {}),
          onDiagnostic: (diagnostic) => report(target.id, diagnostic),
        });
        artifact = createArtifact(declarations, { root: target.selector, targets: target.targets });
      } catch (error) {
        if (error instanceof SerializationError) {
          logger.warn(`${STYLE_ENGINE_LOG_PREFIX} Keeping previous style sheet for ${target.id}:`, error.message);
          report(target.id, { code: error.code, message: error.message, path: error.details?.path });
          return null;
        }
        throw error;
      }
      regenerations++;
      cache.set(windowRecord.window.id, target.id, key, artifact);
    }

    if (record.appliedHash !== artifact.hash) {
      target.setStyleSheet(artifact.text);
      record.appliedHash = artifact.hash;
    }
    return artifact;
  }

  /** Re-render tracked widgets; failures are logged and the old text stays */
  function refresh(widgetIds: Iterable<string>): void {
    for (const id of Array.from(widgetIds)) {
      const record = widgets.get(id);
      const windowRecord = record ? windows.get(record.target.window.id) : undefined;
      if (!record || !windowRecord) continue;
      try {
        render(record, windowRecord);
      } catch (error) {
        logger.error(`${STYLE_ENGINE_LOG_PREFIX} Failed to restyle ${id}: ${describeError(error)}`);
      }
    }
  }

  function publishApplicationStyleSheet(): void {
    if (!options.application) return;
    try {
      options.application.setStyleSheet(generateThemeStyleSheet(handle, normalizer));
    } catch (error) {
      if (!isStyleEngineError(error)) throw error;
      logger.error(`${STYLE_ENGINE_LOG_PREFIX} Keeping previous application style sheet: ${describeError(error)}`);
    }
  }

  function runContrastAudit(): void {
    if (!auditOptions) return;
    const issues = auditColorContrast(handle.tokens, auditOptions);
    for (const issue of issues) {
      logger.warn(
        `${STYLE_ENGINE_LOG_PREFIX} Low contrast: ${issue.family}.${issue.index} (${issue.shade}) ratio ${issue.ratio}`,
      );
    }
  }

  // ===========================================================================
  // Windows
  // ===========================================================================

  function handleBreakpointChange(event: BreakpointChangeEvent): void {
    const windowRecord = windows.get(event.windowId);
    if (!windowRecord) return;
    const dropped = cache.invalidateWindow(event.windowId);
    logger.debug(
      `${STYLE_ENGINE_LOG_PREFIX} ${event.windowId}: ${event.previous} -> ${event.current} (dropped ${dropped})`,
    );
    refresh(windowRecord.widgets);
    for (const listener of Array.from(breakpointListeners)) {
      safeCall(listener, event, 'Breakpoint');
    }
  }

  function attachWindow(window: HostWindow): ResponsiveContext {
    assertActive();
    const existing = windows.get(window.id);
    if (existing) return existing.context;

    const disposer = new Disposer((error) =>
      logger.warn(`${STYLE_ENGINE_LOG_PREFIX} Window cleanup failed:`, error),
    );
    const context = createResponsiveContext({
      windowId: window.id,
      thresholds: handle.tokens.getBreakpoints(),
      initialWidth: window.width(),
      debounceMs,
      onListenerError: (error) => logger.warn(`${STYLE_ENGINE_LOG_PREFIX} Breakpoint handler failed:`, error),
    });
    disposer.add(() => context.dispose());
    disposer.add(context.subscribe(handleBreakpointChange));
    disposer.listen<number>((listener) => window.onResize(listener), (width) => context.measure(width));
    if (window.onClose) {
      disposer.add(window.onClose(() => detachWindow(window.id)));
    }

    windows.set(window.id, { window, context, disposer, widgets: new Set() });
    return context;
  }

  function forgetWidget(widgetId: string): void {
    const record = widgets.get(widgetId);
    if (!record) return;
    widgets.delete(widgetId);
    widgetListeners.delete(widgetId);
    const windowId = record.target.window.id;
    windows.get(windowId)?.widgets.delete(widgetId);
    cache.delete(windowId, widgetId);
  }

  function detachWindow(windowId: string): void {
    const windowRecord = windows.get(windowId);
    if (!windowRecord) return;
    windows.delete(windowId);
    for (const widgetId of Array.from(windowRecord.widgets)) forgetWidget(widgetId);
    cache.invalidateWindow(windowId);
    windowRecord.disposer.dispose();
  }

  // ===========================================================================
  // Theme
  // ===========================================================================

  function apply(candidate: Theme): boolean {
    assertActive();
    const theme = freezeTheme(candidate);
    const tokens = validateTheme(theme);
    const nextKey = themeFingerprint(theme);
    if (nextKey === themeKey) {
      logger.debug(`${STYLE_ENGINE_LOG_PREFIX} Theme unchanged; version stays ${handle.version}`);
      return false;
    }

    const previousVersion = handle.version;
    handle = createThemeHandle(theme, previousVersion + 1, tokens);
    themeKey = nextKey;
    variableTables.clear();

    const thresholds = tokens.getBreakpoints();
    for (const windowRecord of Array.from(windows.values())) {
      windowRecord.context.setThresholds(thresholds);
    }

    refresh(widgets.keys());
    publishApplicationStyleSheet();
    runContrastAudit();

    const event: ThemeChangeEvent = { theme, version: handle.version, previousVersion };
    for (const [widgetId, listeners] of Array.from(widgetListeners)) {
      if (!widgets.has(widgetId)) continue;
      for (const listener of Array.from(listeners)) safeCall(listener, event, 'Widget theme');
    }
    for (const listener of Array.from(themeListeners)) safeCall(listener, event, 'Theme');
    return true;
  }

  function update(partial: unknown): boolean {
    return apply(mergeTheme(handle.theme, parseThemeOverride(partial)));
  }

  apply(handle.theme);

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    getTheme: () => handle.theme,
    getHandle: () => handle,
    getVersion: () => handle.version,

    apply,
    update,

    registerColorFamily: (family, shades) => update({ colors: { [family]: [...shades] } }),

    setColorScheme: (scheme) => update({ colorScheme: scheme }),

    toggleColorScheme() {
      const next: ColorScheme = handle.theme.colorScheme === 'light' ? 'dark' : 'light';
      update({ colorScheme: next });
      return next;
    },

    setPrimaryColor: (family) => update({ primaryColor: family }),

    attachWindow,
    detachWindow,

    getActiveBreakpoint(windowId) {
      const windowRecord = windows.get(windowId);
      if (!windowRecord) throw new Error(`${STYLE_ENGINE_LOG_PREFIX} Window "${windowId}" is not attached`);
      return windowRecord.context.getActiveBreakpoint();
    },

    getThemeVariables(windowId) {
      const windowRecord = windowId === undefined ? undefined : windows.get(windowId);
      const breakpoint = windowRecord?.context.getActiveBreakpoint() ?? BASE_BREAKPOINT;
      let table = variableTables.get(breakpoint);
      if (!table) {
        table = createThemeVariables(handle, {
          breakpoint,
          onDiagnostic: (diagnostic) => report('theme', diagnostic),
        });
        variableTables.set(breakpoint, table);
      }
      return table;
    },

    resolveAndApply(widget, bag, resolveOptions = {}) {
      assertActive();
      attachWindow(widget.window);
      const windowRecord = windows.get(widget.window.id);
      if (!windowRecord) throw new Error(`${STYLE_ENGINE_LOG_PREFIX} Window "${widget.window.id}" is not attached`);

      const component = resolveOptions.component ?? widget.component;
      const previous = widgets.get(widget.id);
      const record: TrackedWidget = {
        target: widget,
        bag,
        component,
        fingerprint: fingerprint({ bag, component, selector: widget.selector, targets: widget.targets }),
        appliedHash: previous?.appliedHash ?? null,
      };

      const artifact = render(record, windowRecord);
      if (!artifact) return null;

      const previousWindowId = previous?.target.window.id;
      if (previousWindowId !== undefined && previousWindowId !== widget.window.id) {
        windows.get(previousWindowId)?.widgets.delete(widget.id);
        cache.delete(previousWindowId, widget.id);
      }
      widgets.set(widget.id, record);
      windowRecord.widgets.add(widget.id);
      return artifact;
    },

    release: forgetWidget,

    subscribe(widget, listener) {
      if (!widgets.has(widget.id)) {
        throw new Error(`${STYLE_ENGINE_LOG_PREFIX} Widget "${widget.id}" is not tracked; call resolveAndApply first`);
      }
      let listeners = widgetListeners.get(widget.id);
      if (!listeners) {
        listeners = new Set();
        widgetListeners.set(widget.id, listeners);
      }
      listeners.add(listener);
      return () => {
        const current = widgetListeners.get(widget.id);
        if (!current) return;
        current.delete(listener);
        if (current.size === 0) widgetListeners.delete(widget.id);
      };
    },

    onThemeChange(listener) {
      themeListeners.add(listener);
      return () => {
        themeListeners.delete(listener);
      };
    },

    onBreakpointChange(listener) {
      breakpointListeners.add(listener);
      return () => {
        breakpointListeners.delete(listener);
      };
    },

    getStats() {
      const cacheStats = cache.getStats();
      return {
        version: handle.version,
        regenerations,
        cacheHits: cacheStats.hits,
        cacheMisses: cacheStats.misses,
        cachedArtifacts: cacheStats.entries,
        widgets: widgets.size,
        windows: windows.size,
      };
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      for (const windowId of Array.from(windows.keys())) detachWindow(windowId);
      widgets.clear();
      widgetListeners.clear();
      themeListeners.clear();
      breakpointListeners.clear();
      cache.clear();
      variableTables.clear();
    },
  };
}

/**
 * Responsive Context
 *
 * Tracks a window's width and classifies it into a breakpoint.
 *
 * Resize events are debounced: the classification settles once no new
 * width has arrived for `debounceMs`. Listeners hear about a change only
 * when the settled breakpoint differs from the previous one, so resizing
 * within a bucket is silent.
 */

import { BASE_BREAKPOINT } from 'facet-shared';

import { DEFAULT_RESIZE_DEBOUNCE_MS, STYLE_ENGINE_LOG_PREFIX } from '../constants';
import type { BreakpointThreshold, Unsubscribe } from './types';

// =============================================================================
// Types
// =============================================================================

export interface BreakpointChangeEvent {
  windowId: string;
  previous: string;
  current: string;
  width: number;
}

export type BreakpointChangeListener = (event: BreakpointChangeEvent) => void;

export interface ResponsiveContextOptions {
  windowId: string;
  /** Ascending thresholds */
  thresholds: readonly BreakpointThreshold[];
  initialWidth: number;
  /**
   * Quiet period before a measurement is classified. 0 classifies immediately.
   * @default 100
   */
  debounceMs?: number;
  /** Receives errors thrown by listeners */
  onListenerError?: (error: unknown) => void;
}

export interface ResponsiveContext {
  readonly windowId: string;
  getActiveBreakpoint(): string;
  /** Last settled width */
  getWidth(): number;
  /** Record a new width (debounced) */
  measure(width: number): void;
  /** Settle a pending measurement now */
  flush(): void;
  /** Swap thresholds and reclassify the settled width immediately */
  setThresholds(thresholds: readonly BreakpointThreshold[]): void;
  subscribe(listener: BreakpointChangeListener): Unsubscribe;
  dispose(): void;
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Largest breakpoint whose threshold is at or below `width`, else `base`.
 */
export function classifyWidth(width: number, thresholds: readonly BreakpointThreshold[]): string {
  let active: string = BASE_BREAKPOINT;
  for (const threshold of thresholds) {
    if (width >= threshold.minWidth) active = threshold.name;
  }
  return active;
}

function sanitizeWidth(width: number): number | null {
  if (!Number.isFinite(width)) return null;
  return Math.max(0, width);
}

function reportListenerError(error: unknown): void {
  console.warn(`${STYLE_ENGINE_LOG_PREFIX} Breakpoint listener failed:`, error);
}

// =============================================================================
// Implementation
// =============================================================================

export function createResponsiveContext(options: ResponsiveContextOptions): ResponsiveContext {
  const { windowId } = options;
  const debounceMs = Math.max(0, options.debounceMs ?? DEFAULT_RESIZE_DEBOUNCE_MS);
  const onListenerError = options.onListenerError ?? reportListenerError;

  let thresholds = options.thresholds;
  let width = sanitizeWidth(options.initialWidth) ?? 0;
  let active = classifyWidth(width, thresholds);
  let pendingWidth: number | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let disposed = false;

  const listeners = new Set<BreakpointChangeListener>();

  function emit(event: BreakpointChangeEvent): void {
    for (const listener of Array.from(listeners)) {
      try {
        listener(event);
      } catch (error) {
        onListenerError(error);
      }
    }
  }

  function reclassify(): void {
    const next = classifyWidth(width, thresholds);
    if (next === active) return;
    const previous = active;
    active = next;
    emit({ windowId, previous, current: next, width });
  }

  function cancelTimer(): void {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  function settle(): void {
    cancelTimer();
    if (pendingWidth === null) return;
    width = pendingWidth;
    pendingWidth = null;
    reclassify();
  }

  return {
    windowId,

    getActiveBreakpoint: () => active,
    getWidth: () => width,

    measure(nextWidth) {
      if (disposed) return;
      const sanitized = sanitizeWidth(nextWidth);
      if (sanitized === null) return;
      pendingWidth = sanitized;
      if (debounceMs === 0) {
        settle();
        return;
      }
      cancelTimer();
      timer = setTimeout(settle, debounceMs);
    },

    flush() {
      if (disposed) return;
      settle();
    },

    setThresholds(next) {
      if (disposed) return;
      thresholds = next;
      reclassify();
    },

    subscribe(listener) {
      if (disposed) return () => {};
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      cancelTimer();
      pendingWidth = null;
      listeners.clear();
    },
  };
}

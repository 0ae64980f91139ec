/**
 * Artifact Cache
 *
 * Generated style sheets keyed per widget, grouped by window.
 *
 * Keys hash the widget id, breakpoint, theme version and a fingerprint of
 * the widget's props. A theme version bump therefore makes every stored
 * entry miss without walking the cache; a breakpoint change drops the
 * entries of that one window.
 */

import { hashString, stableStringify } from '../utils/fingerprint';
import type { StyleSheetArtifact } from './types';

// =============================================================================
// Types
// =============================================================================

export interface CacheKeyParts {
  widgetId: string;
  breakpoint: string;
  themeVersion: number;
  /** Fingerprint of the prop bag, component and selectors */
  fingerprint: string;
}

export interface ArtifactCacheStats {
  hits: number;
  misses: number;
  /** Stored entries across all windows */
  entries: number;
}

export interface ArtifactCache {
  computeKey(parts: CacheKeyParts): string;
  /** Stored artifact when its key matches, else null (counted as a miss) */
  get(windowId: string, widgetId: string, key: string): StyleSheetArtifact | null;
  set(windowId: string, widgetId: string, key: string, artifact: StyleSheetArtifact): void;
  delete(windowId: string, widgetId: string): void;
  /** Drop every entry of one window; returns the number dropped */
  invalidateWindow(windowId: string): number;
  clear(): void;
  getStats(): ArtifactCacheStats;
}

interface CacheEntry {
  key: string;
  artifact: StyleSheetArtifact;
}

// =============================================================================
// Implementation
// =============================================================================

export function createArtifactCache(): ArtifactCache {
  const windows = new Map<string, Map<string, CacheEntry>>();
  let hits = 0;
  let misses = 0;

  function countEntries(): number {
    let total = 0;
    for (const entries of windows.values()) total += entries.size;
    return total;
  }

  return {
    computeKey(parts) {
      return hashString(
        stableStringify([parts.widgetId, parts.breakpoint, parts.themeVersion, parts.fingerprint]),
      );
    },

    get(windowId, widgetId, key) {
      const entry = windows.get(windowId)?.get(widgetId);
      if (entry && entry.key === key) {
        hits++;
        return entry.artifact;
      }
      misses++;
      return null;
    },

    set(windowId, widgetId, key, artifact) {
      let entries = windows.get(windowId);
      if (!entries) {
        entries = new Map();
        windows.set(windowId, entries);
      }
      entries.set(widgetId, { key, artifact });
    },

    delete(windowId, widgetId) {
      const entries = windows.get(windowId);
      if (!entries) return;
      entries.delete(widgetId);
      if (entries.size === 0) windows.delete(windowId);
    },

    invalidateWindow(windowId) {
      const dropped = windows.get(windowId)?.size ?? 0;
      windows.delete(windowId);
      return dropped;
    },

    clear() {
      windows.clear();
    },

    getStats: () => ({ hits, misses, entries: countEntries() }),
  };
}

/**
 * Unit tests for the Artifact Cache
 */

import { describe, expect, it } from 'vitest';

import { createArtifactCache } from '@/core/artifact-cache';
import type { StyleSheetArtifact } from '@/core/types';

const artifact: StyleSheetArtifact = { text: 'QWidget {\n  color: red;\n}', hash: 'abc', selectors: ['QWidget'] };

const parts = { widgetId: 'card', breakpoint: 'sm', themeVersion: 1, fingerprint: 'f1' };

describe('artifact-cache: keys', () => {
  it('derives the same key from the same parts', () => {
    const cache = createArtifactCache();
    expect(cache.computeKey(parts)).toBe(cache.computeKey({ ...parts }));
  });

  it('derives a different key when any part changes', () => {
    const cache = createArtifactCache();
    const key = cache.computeKey(parts);
    expect(cache.computeKey({ ...parts, themeVersion: 2 })).not.toBe(key);
    expect(cache.computeKey({ ...parts, breakpoint: 'md' })).not.toBe(key);
    expect(cache.computeKey({ ...parts, fingerprint: 'f2' })).not.toBe(key);
  });
});

describe('artifact-cache: lookups', () => {
  it('misses before set and hits after', () => {
    const cache = createArtifactCache();
    const key = cache.computeKey(parts);

    expect(cache.get('w1', 'card', key)).toBeNull();
    cache.set('w1', 'card', key, artifact);
    expect(cache.get('w1', 'card', key)).toBe(artifact);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });

  it('misses when the stored key is stale', () => {
    const cache = createArtifactCache();
    cache.set('w1', 'card', cache.computeKey(parts), artifact);
    expect(cache.get('w1', 'card', cache.computeKey({ ...parts, themeVersion: 2 }))).toBeNull();
  });

  it('invalidates one window only', () => {
    const cache = createArtifactCache();
    cache.set('w1', 'a', 'k1', artifact);
    cache.set('w1', 'b', 'k2', artifact);
    cache.set('w2', 'c', 'k3', artifact);

    expect(cache.invalidateWindow('w1')).toBe(2);
    expect(cache.get('w1', 'a', 'k1')).toBeNull();
    expect(cache.get('w2', 'c', 'k3')).toBe(artifact);
    expect(cache.getStats().entries).toBe(1);
  });

  it('deletes single entries and clears everything', () => {
    const cache = createArtifactCache();
    cache.set('w1', 'a', 'k1', artifact);
    cache.set('w1', 'b', 'k2', artifact);

    cache.delete('w1', 'a');
    expect(cache.getStats().entries).toBe(1);

    cache.clear();
    expect(cache.getStats().entries).toBe(0);
  });
});

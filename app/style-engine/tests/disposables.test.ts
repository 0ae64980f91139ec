/**
 * Unit tests for the Disposer
 */

import { describe, expect, it, vi } from 'vitest';

import { Disposer } from '@/utils/disposables';

describe('disposables: Disposer', () => {
  it('disposes in reverse registration order', () => {
    const order: string[] = [];
    const disposer = new Disposer();
    disposer.add(() => order.push('first'));
    disposer.add(() => order.push('second'));

    disposer.dispose();

    expect(order).toEqual(['second', 'first']);
    expect(disposer.isDisposed).toBe(true);
  });

  it('runs late registrations immediately', () => {
    const disposer = new Disposer();
    disposer.dispose();

    const late = vi.fn();
    disposer.add(late);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('is safe to dispose twice', () => {
    const cleanup = vi.fn();
    const disposer = new Disposer();
    disposer.add(cleanup);

    disposer.dispose();
    disposer.dispose();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('routes cleanup errors and keeps disposing', () => {
    const onError = vi.fn();
    const after = vi.fn();
    const disposer = new Disposer(onError);
    disposer.add(after);
    disposer.add(() => {
      throw new Error('boom');
    });

    disposer.dispose();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('unsubscribes listeners on dispose', () => {
    const listeners = new Set<(payload: number) => void>();
    const subscribe = (listener: (payload: number) => void) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    };
    const received: number[] = [];
    const disposer = new Disposer();

    disposer.listen(subscribe, (value) => received.push(value));
    for (const listener of listeners) listener(1);
    disposer.dispose();

    expect(received).toEqual([1]);
    expect(listeners.size).toBe(0);
  });
});

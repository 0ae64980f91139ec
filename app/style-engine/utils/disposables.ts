/**
 * Disposables Utility
 *
 * Provides deterministic cleanup for host subscriptions and other resources.
 * Ensures proper cleanup order (LIFO).
 */

import { STYLE_ENGINE_LOG_PREFIX } from '../constants';

/** Function that performs cleanup */
export type DisposeFn = () => void;

/** Anything exposing `subscribe(listener) => unsubscribe` */
export type Subscribe<T> = (listener: (payload: T) => void) => DisposeFn;

/** Receives errors thrown by dispose functions */
export type DisposeErrorHandler = (error: unknown) => void;

function reportDisposeError(error: unknown): void {
  console.warn(`${STYLE_ENGINE_LOG_PREFIX} Dispose callback failed:`, error);
}

/**
 * Manages a collection of disposable resources.
 * Resources are disposed in reverse order (LIFO).
 */
export class Disposer {
  private disposed = false;
  private readonly disposers: DisposeFn[] = [];

  constructor(private readonly onError: DisposeErrorHandler = reportDisposeError) {}

  /** Whether this disposer has already been disposed */
  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Add a dispose function to be called during cleanup.
   * If already disposed, the function is called immediately.
   */
  add(dispose: DisposeFn): void {
    if (this.disposed) {
      this.run(dispose);
      return;
    }
    this.disposers.push(dispose);
  }

  /**
   * Subscribe to a host event source and automatically unsubscribe on dispose.
   */
  listen<T>(subscribe: Subscribe<T>, listener: (payload: T) => void): DisposeFn {
    const unsubscribe = subscribe(listener);
    this.add(unsubscribe);
    return unsubscribe;
  }

  /**
   * Dispose all registered resources in reverse order.
   * Safe to call multiple times.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    // Dispose in reverse order (LIFO)
    for (let i = this.disposers.length - 1; i >= 0; i--) {
      this.run(this.disposers[i]);
    }

    this.disposers.length = 0;
  }

  private run(dispose: DisposeFn | undefined): void {
    if (!dispose) return;
    try {
      dispose();
    } catch (error) {
      this.onError(error);
    }
  }
}

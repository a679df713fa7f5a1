/**
 * Single-consumer async queue bridging push-style callbacks into an
 * AsyncIterableIterator.
 *
 * Values pushed before the consumer asks are buffered in order. After end()
 * the buffer drains and then the iterator completes; after fail() the
 * buffer drains and the next read throws once, then completes.
 *
 * @module shared/async-queue
 */

// ============================================================================
// Types
// ============================================================================

export interface AsyncQueue<T> extends AsyncIterableIterator<T> {
  push(value: T): void;
  end(): void;
  fail(error: unknown): void;
  isDone(): boolean;
  size(): number;
  return(): Promise<IteratorResult<T>>;
}

export interface AsyncQueueOptions {
  /** Called once when the consumer stops early (break / return()). */
  readonly onReturn?: () => void;
}

type Terminal =
  | { readonly kind: 'END' }
  | { readonly kind: 'ERROR'; readonly error: unknown };

interface Waiter<T> {
  readonly resolve: (result: IteratorResult<T>) => void;
  readonly reject: (error: unknown) => void;
}

// ============================================================================
// Queue
// ============================================================================

export function createAsyncQueue<T>(options: AsyncQueueOptions = {}): AsyncQueue<T> {
  // Boxed so a queued `undefined` is distinguishable from an empty buffer.
  const buffer: { readonly value: T }[] = [];
  const waiters: Waiter<T>[] = [];
  let terminal: Terminal | null = null;
  let returned = false;

  function doneResult(): IteratorResult<T> {
    return { done: true, value: undefined };
  }

  function settleWaiters(): void {
    if (terminal === null) {
      return;
    }

    let waiter = waiters.shift();
    while (waiter !== undefined) {
      if (terminal.kind === 'ERROR') {
        const { error } = terminal;
        terminal = { kind: 'END' };
        waiter.reject(error);
      } else {
        waiter.resolve(doneResult());
      }
      waiter = waiters.shift();
    }
  }

  const queue: AsyncQueue<T> = {
    push(value: T): void {
      if (terminal !== null) {
        return;
      }

      const waiter = waiters.shift();
      if (waiter !== undefined) {
        waiter.resolve({ done: false, value });
        return;
      }

      buffer.push({ value });
    },

    end(): void {
      if (terminal !== null) {
        return;
      }
      terminal = { kind: 'END' };
      settleWaiters();
    },

    fail(error: unknown): void {
      if (terminal !== null) {
        return;
      }
      terminal = { kind: 'ERROR', error };
      settleWaiters();
    },

    isDone(): boolean {
      return terminal !== null && buffer.length === 0;
    },

    size(): number {
      return buffer.length;
    },

    next(): Promise<IteratorResult<T>> {
      const entry = buffer.shift();
      if (entry !== undefined) {
        return Promise.resolve({ done: false, value: entry.value });
      }

      if (terminal !== null) {
        if (terminal.kind === 'ERROR') {
          const { error } = terminal;
          terminal = { kind: 'END' };
          return Promise.reject(error);
        }
        return Promise.resolve(doneResult());
      }

      return new Promise<IteratorResult<T>>((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },

    return(): Promise<IteratorResult<T>> {
      buffer.length = 0;
      if (terminal === null) {
        terminal = { kind: 'END' };
        settleWaiters();
      }
      if (!returned) {
        returned = true;
        options.onReturn?.();
      }
      return Promise.resolve(doneResult());
    },

    [Symbol.asyncIterator](): AsyncIterableIterator<T> {
      return queue;
    },
  };

  return queue;
}

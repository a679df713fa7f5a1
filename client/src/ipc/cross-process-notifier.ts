/**
 * Cross-process notifier.
 *
 * Fire-and-forget signals between cooperating processes on one host, such
 * as a capture helper telling the main process a broadcast started. At most
 * once, unordered across signal kinds, no payload. Nothing may depend on a
 * notification arriving.
 *
 * Wire format: one UTF-8 datagram `<namespace>:<signal>`. Datagrams from
 * other namespaces or with unknown signal names are ignored.
 *
 * @module ipc/cross-process-notifier
 */

import { createAsyncQueue, type AsyncQueue } from '../shared/async-queue.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { createMulticastChannel } from './multicast-channel.js';
import {
  isCrossProcessSignal,
  type CrossProcessSignal,
  type NotificationChannel,
  type SignalHandler,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_NAMESPACE = 'signal-resilience';
const MAX_SUBSCRIBERS = 32;
const SEPARATOR = ':';

// ============================================================================
// Types
// ============================================================================

export interface CrossProcessNotifierConfig {
  readonly channel: NotificationChannel;
  /** Scopes signals so unrelated programs sharing the channel don't collide. */
  readonly namespace: string;
  readonly logger: Logger;
}

export interface CrossProcessNotifier {
  post(signal: CrossProcessSignal): void;
  subscribe(signal: CrossProcessSignal, handler: SignalHandler): () => void;
  signals(
    signal: CrossProcessSignal,
    abortSignal?: AbortSignal
  ): AsyncIterableIterator<CrossProcessSignal>;
  close(): void;
  isClosed(): boolean;
}

interface Subscription {
  readonly signal: CrossProcessSignal;
  readonly handler: SignalHandler;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): CrossProcessNotifierConfig {
  const logger = createLogger('ipc');
  return {
    channel: createMulticastChannel({ logger }),
    namespace: DEFAULT_NAMESPACE,
    logger,
  };
}

// ============================================================================
// Wire Format
// ============================================================================

export function encodeSignal(namespace: string, signal: CrossProcessSignal): string {
  return `${namespace}${SEPARATOR}${signal}`;
}

export function decodeSignal(namespace: string, payload: string): CrossProcessSignal | null {
  const prefix = `${namespace}${SEPARATOR}`;
  if (!payload.startsWith(prefix)) {
    return null;
  }
  const name = payload.slice(prefix.length);
  return isCrossProcessSignal(name) ? name : null;
}

// ============================================================================
// Cross-Process Notifier
// ============================================================================

export function createCrossProcessNotifier(
  configOverrides?: Partial<CrossProcessNotifierConfig>
): CrossProcessNotifier {
  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  const config: CrossProcessNotifierConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  if (config.namespace.length === 0 || config.namespace.includes(SEPARATOR)) {
    throw new RangeError(`namespace must be non-empty and contain no '${SEPARATOR}'`);
  }

  const { channel, logger } = config;

  let closed = false;
  const subscriptions: (Subscription | null)[] = new Array(MAX_SUBSCRIBERS).fill(null);
  const streams = new Map<AsyncQueue<CrossProcessSignal>, () => void>();

  // --------------------------------------------------------------------------
  // Receive
  // --------------------------------------------------------------------------

  function handlePayload(payload: string): void {
    const signal = decodeSignal(config.namespace, payload);
    if (signal === null) {
      logger.debug(`Ignoring notification: ${payload}`);
      return;
    }

    // Bounded loop
    for (let i = 0; i < MAX_SUBSCRIBERS; i += 1) {
      const subscription = subscriptions[i];
      if (subscription === null || subscription === undefined || subscription.signal !== signal) {
        continue;
      }
      try {
        subscription.handler(signal);
      } catch (err) {
        logger.error(`Handler for ${signal} threw:`, err);
      }
    }
  }

  channel.open(handlePayload);

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  function post(signal: CrossProcessSignal): void {
    if (closed) {
      logger.debug(`Dropping ${signal}: notifier closed`);
      return;
    }

    channel.send(encodeSignal(config.namespace, signal)).catch((err: unknown) => {
      logger.warn(`Failed to post ${signal}:`, err);
    });
  }

  function subscribe(signal: CrossProcessSignal, handler: SignalHandler): () => void {
    if (closed) {
      return () => {};
    }

    let slotIndex = -1;

    // Find empty slot (bounded loop)
    for (let i = 0; i < MAX_SUBSCRIBERS; i += 1) {
      if (subscriptions[i] === null) {
        slotIndex = i;
        break;
      }
    }

    if (slotIndex === -1) {
      logger.warn('Max notification subscribers reached');
      return () => {};
    }

    const subscription: Subscription = { signal, handler };
    subscriptions[slotIndex] = subscription;

    return () => {
      if (subscriptions[slotIndex] === subscription) {
        subscriptions[slotIndex] = null;
      }
    };
  }

  function signals(
    signal: CrossProcessSignal,
    abortSignal?: AbortSignal
  ): AsyncIterableIterator<CrossProcessSignal> {
    let unsubscribe: () => void = () => {};

    function release(): void {
      unsubscribe();
      streams.delete(stream);
    }

    const stream = createAsyncQueue<CrossProcessSignal>({ onReturn: release });

    if (closed || abortSignal?.aborted === true) {
      stream.end();
      return stream;
    }

    unsubscribe = subscribe(signal, (received) => stream.push(received));
    streams.set(stream, unsubscribe);

    abortSignal?.addEventListener(
      'abort',
      () => {
        release();
        stream.end();
      },
      { once: true }
    );

    return stream;
  }

  function close(): void {
    if (closed) {
      return;
    }
    closed = true;

    for (const [stream, unsubscribe] of streams) {
      unsubscribe();
      stream.end();
    }
    streams.clear();
    subscriptions.fill(null);

    channel.close();
  }

  return {
    post,
    subscribe,
    signals,
    close,
    isClosed: () => closed,
  };
}

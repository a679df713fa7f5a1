/**
 * A single live duplex connection over one transport.
 *
 * State machine: CONNECTING -> OPEN -> {CLOSING -> CLOSED, FAILED}.
 * There is no way back to OPEN; reconnecting always means a new Connection.
 *
 * openConnection() settles once per attempt: it resolves on the transport's
 * open acknowledgment and rejects on timeout, abort, error or a close that
 * arrives before open. In every rejecting case the transport is terminated.
 *
 * @module transport/connection
 */

import { createAsyncQueue } from '../shared/async-queue.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import {
  cancelledError,
  classifyTransportError,
  isNormalCloseCode,
  serverCloseError,
  TransportError,
  TransportErrorCode,
} from './errors.js';
import {
  ConnectionState,
  messageByteLength,
  type ConnectionStats,
  type StateHandler,
  type Transport,
  type TransportFactory,
  type TransportHandlers,
  type TransportMessage,
  type TransportRequest,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const NORMAL_CLOSE_CODE = 1000;
const DEFAULT_CLOSE_TIMEOUT_MS = 1000;
const MAX_STATE_HANDLERS = 16;

// ============================================================================
// Types
// ============================================================================

export interface Connection {
  readonly id: string;
  readonly url: string;
  getState(): ConnectionState;
  /** The error that moved the connection to FAILED, if any. */
  getError(): TransportError | null;
  getStats(): ConnectionStats;
  /** Received messages in arrival order. May be called once. */
  messages(): AsyncIterableIterator<TransportMessage>;
  send(message: TransportMessage): Promise<void>;
  close(): void;
  onStateChange(handler: StateHandler): () => void;
}

export interface OpenConnectionOptions {
  readonly request: TransportRequest;
  readonly factory: TransportFactory;
  /** Bound on this single attempt, in milliseconds. */
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  /** How long close() waits for the peer's close frame before dropping the socket. */
  readonly closeTimeoutMs?: number;
}

interface MutableStats {
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  lastMessageTime: number;
  connectedAt: number | null;
}

let nextConnectionId = 1;

// ============================================================================
// Open
// ============================================================================

export function openConnection(options: OpenConnectionOptions): Promise<Connection> {
  const { request, factory, timeoutMs, signal } = options;
  const logger = options.logger ?? silentLogger;
  const closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
  const id = `conn-${nextConnectionId}`;
  nextConnectionId += 1;

  if (signal?.aborted === true) {
    return Promise.reject(cancelledError(signal.reason));
  }

  return new Promise<Connection>((resolve, reject) => {
    // ------------------------------------------------------------------------
    // State
    // ------------------------------------------------------------------------

    let state: ConnectionState = ConnectionState.CONNECTING;
    let lastError: TransportError | null = null;
    let transport: Transport | null = null;
    let settled = false;
    let consumed = false;
    let timeoutId: ReturnType<typeof setTimeout> | null = null;
    let closeTimeoutId: ReturnType<typeof setTimeout> | null = null;

    const stats: MutableStats = {
      messagesSent: 0,
      messagesReceived: 0,
      bytesSent: 0,
      bytesReceived: 0,
      lastMessageTime: 0,
      connectedAt: null,
    };

    const stateHandlers: (StateHandler | null)[] = new Array(MAX_STATE_HANDLERS).fill(null);
    const inbox = createAsyncQueue<TransportMessage>({ onReturn: () => close() });

    // ------------------------------------------------------------------------
    // State Transitions
    // ------------------------------------------------------------------------

    function setState(next: ConnectionState): void {
      if (state === next) {
        return;
      }
      logger.debug(`${id}: ${state} -> ${next}`);
      state = next;

      // Bounded loop
      for (let i = 0; i < MAX_STATE_HANDLERS; i += 1) {
        const handler = stateHandlers[i];
        if (handler === null || handler === undefined) {
          continue;
        }
        try {
          handler(next);
        } catch (err) {
          logger.error(`${id}: state handler threw:`, err);
        }
      }
    }

    function clearPending(): void {
      if (timeoutId !== null) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      signal?.removeEventListener('abort', onAbort);
    }

    function failBeforeOpen(error: TransportError): void {
      if (settled) {
        return;
      }
      settled = true;
      clearPending();
      lastError = error;
      setState(ConnectionState.FAILED);
      transport?.terminate();
      reject(error);
    }

    function failWhileOpen(error: TransportError): void {
      lastError = error;
      setState(ConnectionState.FAILED);
      inbox.fail(error);
      transport?.terminate();
    }

    function onAbort(): void {
      failBeforeOpen(cancelledError(signal?.reason));
    }

    // ------------------------------------------------------------------------
    // Transport Callbacks
    // ------------------------------------------------------------------------

    const handlers: TransportHandlers = {
      onOpen(): void {
        if (settled) {
          return;
        }
        settled = true;
        clearPending();
        stats.connectedAt = Date.now();
        setState(ConnectionState.OPEN);
        resolve(connection);
      },

      onMessage(message: TransportMessage): void {
        if (state !== ConnectionState.OPEN) {
          return;
        }
        stats.messagesReceived += 1;
        stats.bytesReceived += messageByteLength(message);
        stats.lastMessageTime = Date.now();
        inbox.push(message);
      },

      onError(err: unknown): void {
        const error = classifyTransportError(err);
        if (!settled) {
          failBeforeOpen(error);
          return;
        }
        if (state === ConnectionState.OPEN) {
          logger.warn(`${id}: transport error: ${error.message}`);
          failWhileOpen(error);
        }
      },

      onClose(code: number, reason: string): void {
        if (!settled) {
          failBeforeOpen(serverCloseError(code, reason));
          return;
        }

        if (state === ConnectionState.CLOSING) {
          finishClose();
          return;
        }

        if (state !== ConnectionState.OPEN) {
          return;
        }

        if (isNormalCloseCode(code)) {
          logger.info(`${id}: closed by server (${code})`);
          setState(ConnectionState.CLOSED);
          inbox.end();
          return;
        }

        logger.warn(`${id}: closed by server with code ${code}`);
        failWhileOpen(serverCloseError(code, reason));
      },
    };

    // ------------------------------------------------------------------------
    // Public API
    // ------------------------------------------------------------------------

    function messages(): AsyncIterableIterator<TransportMessage> {
      if (consumed) {
        throw new TransportError(
          TransportErrorCode.INVALID_STATE,
          'messages() may only be consumed once per connection'
        );
      }
      consumed = true;
      return inbox;
    }

    async function send(message: TransportMessage): Promise<void> {
      if (state !== ConnectionState.OPEN || transport === null) {
        throw new TransportError(TransportErrorCode.CLOSED, `Connection is ${state}`);
      }

      try {
        await transport.send(message);
      } catch (err) {
        throw classifyTransportError(err);
      }

      stats.messagesSent += 1;
      stats.bytesSent += messageByteLength(message);
      stats.lastMessageTime = Date.now();
    }

    function finishClose(): void {
      if (closeTimeoutId !== null) {
        clearTimeout(closeTimeoutId);
        closeTimeoutId = null;
      }
      setState(ConnectionState.CLOSED);
    }

    function close(): void {
      if (state !== ConnectionState.OPEN) {
        return;
      }
      setState(ConnectionState.CLOSING);
      inbox.end();

      // A silent peer must not hold the socket open.
      closeTimeoutId = setTimeout(() => {
        closeTimeoutId = null;
        if (state !== ConnectionState.CLOSING) {
          return;
        }
        logger.debug(`${id}: no close frame within ${closeTimeoutMs}ms, terminating`);
        transport?.terminate();
        finishClose();
      }, closeTimeoutMs);

      transport?.close(NORMAL_CLOSE_CODE, 'client closed');
    }

    function onStateChange(handler: StateHandler): () => void {
      let slotIndex = -1;

      // Find empty slot (bounded loop)
      for (let i = 0; i < MAX_STATE_HANDLERS; i += 1) {
        if (stateHandlers[i] === null) {
          slotIndex = i;
          break;
        }
      }

      if (slotIndex === -1) {
        logger.warn(`${id}: max state handlers reached`);
        return () => {};
      }

      stateHandlers[slotIndex] = handler;

      return () => {
        if (stateHandlers[slotIndex] === handler) {
          stateHandlers[slotIndex] = null;
        }
      };
    }

    function getStats(): ConnectionStats {
      return { state, ...stats };
    }

    const connection: Connection = {
      id,
      url: request.url,
      getState: () => state,
      getError: () => lastError,
      getStats,
      messages,
      send,
      close,
      onStateChange,
    };

    // ------------------------------------------------------------------------
    // Attempt
    // ------------------------------------------------------------------------

    signal?.addEventListener('abort', onAbort, { once: true });
    timeoutId = setTimeout(() => {
      timeoutId = null;
      failBeforeOpen(
        new TransportError(TransportErrorCode.TIMEOUT, `No open acknowledgment within ${timeoutMs}ms`)
      );
    }, timeoutMs);

    try {
      transport = factory(request, handlers);
    } catch (err) {
      failBeforeOpen(classifyTransportError(err));
      return;
    }

    // The factory may have reported a failure synchronously.
    if (connection.getState() === ConnectionState.FAILED) {
      transport.terminate();
    }
  });
}

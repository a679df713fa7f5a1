/**
 * Resilient connector.
 *
 * Establishes a Connection to a signaling endpoint, retrying a bounded
 * number of times with capped exponential backoff when (and only when) the
 * attempt failed with a retryable error. The per-attempt timeout is
 * independent of the retry budget; there is no overall deadline beyond
 * maxConnectDurationMs().
 *
 * @module transport/resilient-connector
 */

import { createLogger, type Logger } from '../shared/logger.js';
import { AbortedError, sleep } from '../shared/sleep.js';
import { openConnection, type Connection } from './connection.js';
import {
  cancelledError,
  classifyTransportError,
  TransportError,
  TransportErrorCode,
} from './errors.js';
import {
  computeRetryDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
} from './retry-policy.js';
import type { TransportFactory, TransportRequest } from './types.js';
import { createWebSocketTransport } from './websocket-transport.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_CLOSE_TIMEOUT_MS = 1000;

const PROTOCOL_MAP: Readonly<Record<string, string>> = {
  'ws:': 'ws:',
  'wss:': 'wss:',
  'http:': 'ws:',
  'https:': 'wss:',
};

// ============================================================================
// Types
// ============================================================================

export interface ResilientConnectorConfig {
  readonly transportFactory: TransportFactory;
  readonly timeoutMs: number;
  /** Wait for the peer's close frame before a closing Connection drops its socket. */
  readonly closeTimeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
  /** Source of randomness for jitter, in [0, 1). */
  readonly random: () => number;
}

export type ConnectAttemptOutcome =
  | { readonly success: true; readonly connection: Connection }
  | { readonly success: false; readonly error: TransportError; readonly retryable: boolean };

export interface AttemptInfo {
  /** Zero-based attempt index. */
  readonly attempt: number;
  readonly outcome: ConnectAttemptOutcome;
  /** Delay before the next attempt, or null when this was the last one. */
  readonly nextDelayMs: number | null;
}

export interface ConnectOptions {
  readonly timeoutMs?: number;
  readonly retryPolicy?: Partial<RetryPolicy>;
  readonly signal?: AbortSignal;
  /** Extra upgrade headers. Authorization is always set from the credential. */
  readonly headers?: Readonly<Record<string, string>>;
  readonly onAttempt?: (info: AttemptInfo) => void;
}

export interface ResilientConnector {
  connect(endpoint: string | URL, credential: string, options?: ConnectOptions): Promise<Connection>;
  connectWithOutcome(
    endpoint: string | URL,
    credential: string,
    options?: ConnectOptions
  ): Promise<ConnectAttemptOutcome>;
  getConfig(): ResilientConnectorConfig;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): ResilientConnectorConfig {
  return {
    transportFactory: createWebSocketTransport,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    closeTimeoutMs: DEFAULT_CLOSE_TIMEOUT_MS,
    retryPolicy: DEFAULT_RETRY_POLICY,
    logger: createLogger('connector'),
    random: Math.random,
  };
}

function assertTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
}

// ============================================================================
// Validation
// ============================================================================

function invalidArgument(message: string, cause?: unknown): TransportError {
  return new TransportError(TransportErrorCode.INVALID_ARGUMENT, message, { cause });
}

/** Normalize the endpoint to a ws:/wss: URL string. */
export function normalizeEndpoint(endpoint: string | URL): string {
  let url: URL;
  try {
    url = new URL(endpoint.toString());
  } catch (err) {
    throw invalidArgument(`Invalid endpoint URL: ${endpoint.toString()}`, err);
  }

  const protocol = PROTOCOL_MAP[url.protocol];
  if (protocol === undefined) {
    throw invalidArgument(`Unsupported endpoint protocol: ${url.protocol}`);
  }

  url.protocol = protocol;
  return url.toString();
}

function resolvePolicy(base: RetryPolicy, overrides?: Partial<RetryPolicy>): RetryPolicy {
  try {
    return createRetryPolicy({ ...base, ...overrides });
  } catch (err) {
    throw invalidArgument(err instanceof Error ? err.message : String(err), err);
  }
}

function resolveTimeout(fallback: number, timeoutMs?: number): number {
  const value = timeoutMs ?? fallback;
  try {
    assertTimeout(value);
  } catch (err) {
    throw invalidArgument(err instanceof Error ? err.message : String(err), err);
  }
  return value;
}

// ============================================================================
// Resilient Connector
// ============================================================================

export function createResilientConnector(
  configOverrides?: Partial<ResilientConnectorConfig>
): ResilientConnector {
  const config: ResilientConnectorConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  assertTimeout(config.timeoutMs);
  if (!Number.isFinite(config.closeTimeoutMs) || config.closeTimeoutMs < 0) {
    throw new RangeError(
      `closeTimeoutMs must be a non-negative number, got ${config.closeTimeoutMs}`
    );
  }
  createRetryPolicy(config.retryPolicy);

  const { logger } = config;

  // --------------------------------------------------------------------------
  // Attempt Loop
  // --------------------------------------------------------------------------

  function reportAttempt(options: ConnectOptions, info: AttemptInfo): void {
    try {
      options.onAttempt?.(info);
    } catch (err) {
      logger.error('onAttempt callback threw:', err);
    }
  }

  async function attemptOnce(
    request: TransportRequest,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ConnectAttemptOutcome> {
    try {
      const connection = await openConnection({
        request,
        factory: config.transportFactory,
        timeoutMs,
        signal,
        logger,
        closeTimeoutMs: config.closeTimeoutMs,
      });
      return { success: true, connection };
    } catch (err) {
      const error = classifyTransportError(err);
      return { success: false, error, retryable: error.retryable };
    }
  }

  async function connectWithOutcome(
    endpoint: string | URL,
    credential: string,
    options: ConnectOptions = {}
  ): Promise<ConnectAttemptOutcome> {
    let request: TransportRequest;
    let policy: RetryPolicy;

    try {
      if (credential.length === 0) {
        throw invalidArgument('Credential must not be empty');
      }
      policy = resolvePolicy(config.retryPolicy, options.retryPolicy);
      request = {
        url: normalizeEndpoint(endpoint),
        headers: { ...options.headers, Authorization: `Bearer ${credential}` },
        handshakeTimeoutMs: resolveTimeout(config.timeoutMs, options.timeoutMs),
      };
    } catch (err) {
      const error = classifyTransportError(err);
      return { success: false, error, retryable: false };
    }

    const { signal } = options;
    let last: ConnectAttemptOutcome = {
      success: false,
      error: cancelledError(),
      retryable: false,
    };

    for (let attempt = 0; attempt < policy.maxAttempts; attempt += 1) {
      if (signal?.aborted === true) {
        return { success: false, error: cancelledError(signal.reason), retryable: false };
      }

      logger.debug(`Connecting to ${request.url} (attempt ${attempt + 1}/${policy.maxAttempts})`);
      last = await attemptOnce(request, request.handshakeTimeoutMs, signal);

      const isLast = attempt + 1 >= policy.maxAttempts;
      const shouldRetry = !last.success && last.retryable && !isLast;
      const nextDelayMs = shouldRetry ? computeRetryDelay(policy, attempt, config.random) : null;

      reportAttempt(options, { attempt, outcome: last, nextDelayMs });

      if (last.success) {
        logger.info(`Connected to ${request.url} as ${last.connection.id}`);
        return last;
      }

      if (nextDelayMs === null) {
        logger.warn(`Connect to ${request.url} failed: ${last.error.message}`);
        return last;
      }

      logger.info(
        `Attempt ${attempt + 1} failed (${last.error.code}), retrying in ${nextDelayMs}ms`
      );

      try {
        await sleep(nextDelayMs, signal);
      } catch (err) {
        if (err instanceof AbortedError) {
          logger.info('Connect cancelled during backoff');
          return { success: false, error: cancelledError(signal?.reason), retryable: false };
        }
        throw err;
      }
    }

    return last;
  }

  async function connect(
    endpoint: string | URL,
    credential: string,
    options?: ConnectOptions
  ): Promise<Connection> {
    const outcome = await connectWithOutcome(endpoint, credential, options);
    if (!outcome.success) {
      throw outcome.error;
    }
    return outcome.connection;
  }

  return {
    connect,
    connectWithOutcome,
    getConfig: () => config,
  };
}

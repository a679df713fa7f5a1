/**
 * Transport error taxonomy.
 *
 * Every failure surfaced by the connector or a connection is a
 * TransportError. Only CONNECTION_RESET is retryable: it matches a known
 * race where the peer resets the socket during the WebSocket upgrade.
 * Everything else (auth, DNS, TLS, server close, timeouts) is terminal.
 *
 * @module transport/errors
 */

import { AbortedError } from '../shared/sleep.js';

// ============================================================================
// Codes
// ============================================================================

export const TransportErrorCode = {
  CONNECTION_RESET: 'CONNECTION_RESET',
  AUTH_REJECTED: 'AUTH_REJECTED',
  HANDSHAKE_REJECTED: 'HANDSHAKE_REJECTED',
  DNS_FAILURE: 'DNS_FAILURE',
  TLS_FAILURE: 'TLS_FAILURE',
  CONNECTION_REFUSED: 'CONNECTION_REFUSED',
  SERVER_CLOSED: 'SERVER_CLOSED',
  TIMEOUT: 'TIMEOUT',
  CANCELLED: 'CANCELLED',
  CLOSED: 'CLOSED',
  INVALID_STATE: 'INVALID_STATE',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type TransportErrorCode =
  (typeof TransportErrorCode)[keyof typeof TransportErrorCode];

const RETRYABLE_CODES: ReadonlySet<TransportErrorCode> = new Set([
  TransportErrorCode.CONNECTION_RESET,
]);

const DNS_ERROR_CODES: ReadonlySet<string> = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'EAI_FAIL',
  'EAI_NONAME',
  'EAI_NODATA',
]);

const TLS_ERROR_CODES: ReadonlySet<string> = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

const NORMAL_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001]);

// ============================================================================
// Error Class
// ============================================================================

export interface TransportErrorOptions {
  readonly cause?: unknown;
  readonly statusCode?: number;
  readonly closeCode?: number;
}

export class TransportError extends Error {
  readonly code: TransportErrorCode;
  /** HTTP status of a rejected upgrade request. */
  readonly statusCode: number | null;
  /** WebSocket close code sent by the server. */
  readonly closeCode: number | null;

  constructor(code: TransportErrorCode, message: string, options: TransportErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.code = code;
    this.statusCode = options.statusCode ?? null;
    this.closeCode = options.closeCode ?? null;
  }

  get retryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

export function isNormalCloseCode(code: number): boolean {
  return NORMAL_CLOSE_CODES.has(code);
}

// ============================================================================
// Constructors
// ============================================================================

export function cancelledError(cause?: unknown): TransportError {
  return new TransportError(TransportErrorCode.CANCELLED, 'Operation cancelled', { cause });
}

export function handshakeStatusError(statusCode: number): TransportError {
  if (statusCode === 401 || statusCode === 403) {
    return new TransportError(
      TransportErrorCode.AUTH_REJECTED,
      `Handshake rejected with HTTP ${statusCode}`,
      { statusCode }
    );
  }
  return new TransportError(
    TransportErrorCode.HANDSHAKE_REJECTED,
    `Unexpected server response: ${statusCode}`,
    { statusCode }
  );
}

export function serverCloseError(closeCode: number, reason: string): TransportError {
  const detail = reason === '' ? '' : `: ${reason}`;
  return new TransportError(
    TransportErrorCode.SERVER_CLOSED,
    `Server closed the connection with code ${closeCode}${detail}`,
    { closeCode }
  );
}

// ============================================================================
// Classification
// ============================================================================

function errorCodeOf(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return null;
  }
  return typeof err.code === 'string' ? err.code : null;
}

function messageOf(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Map anything thrown by Node, `ws` or a transport into a TransportError.
 * TransportErrors pass through unchanged.
 */
export function classifyTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) {
    return err;
  }

  if (err instanceof AbortedError) {
    return cancelledError(err);
  }

  const message = messageOf(err);
  const code = errorCodeOf(err);

  if (code === 'ECONNRESET') {
    return new TransportError(
      TransportErrorCode.CONNECTION_RESET,
      `Connection reset: ${message}`,
      { cause: err }
    );
  }

  if (code !== null && DNS_ERROR_CODES.has(code)) {
    return new TransportError(TransportErrorCode.DNS_FAILURE, message, { cause: err });
  }

  if (
    code !== null &&
    (TLS_ERROR_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_'))
  ) {
    return new TransportError(TransportErrorCode.TLS_FAILURE, message, { cause: err });
  }

  if (code === 'ECONNREFUSED') {
    return new TransportError(TransportErrorCode.CONNECTION_REFUSED, message, { cause: err });
  }

  if (code === 'ETIMEDOUT' || /handshake has timed out/i.test(message)) {
    return new TransportError(TransportErrorCode.TIMEOUT, message, { cause: err });
  }

  return new TransportError(TransportErrorCode.UNKNOWN, message, { cause: err });
}

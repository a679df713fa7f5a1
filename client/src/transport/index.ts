/**
 * Transport module exports.
 *
 * Provides the resilient connector, the Connection it produces and the
 * WebSocket transport underneath.
 *
 * @module transport
 */

// ============================================================================
// Types
// ============================================================================

export {
  binaryMessage,
  ConnectionState,
  messageByteLength,
  MessageKind,
  textMessage,
  type BinaryMessage,
  type ConnectionStats,
  type StateHandler,
  type TextMessage,
  type Transport,
  type TransportFactory,
  type TransportHandlers,
  type TransportMessage,
  type TransportRequest,
} from './types.js';

// ============================================================================
// Errors
// ============================================================================

export {
  cancelledError,
  classifyTransportError,
  handshakeStatusError,
  isNormalCloseCode,
  isRetryableError,
  serverCloseError,
  TransportError,
  TransportErrorCode,
  type TransportErrorOptions,
} from './errors.js';

// ============================================================================
// Retry Policy
// ============================================================================

export {
  computeRetryDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  maxConnectDurationMs,
  type RetryPolicy,
} from './retry-policy.js';

// ============================================================================
// Connection
// ============================================================================

export {
  openConnection,
  type Connection,
  type OpenConnectionOptions,
} from './connection.js';

export { createWebSocketTransport, decodeFrame } from './websocket-transport.js';

// ============================================================================
// Resilient Connector
// ============================================================================

export {
  createResilientConnector,
  normalizeEndpoint,
  type AttemptInfo,
  type ConnectAttemptOutcome,
  type ConnectOptions,
  type ResilientConnector,
  type ResilientConnectorConfig,
} from './resilient-connector.js';

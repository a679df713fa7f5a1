/**
 * Transport types shared by the connector, connections and transport
 * implementations.
 *
 * @module transport/types
 */

// ============================================================================
// Messages
// ============================================================================

export const MessageKind = {
  TEXT: 'TEXT',
  BINARY: 'BINARY',
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

export interface TextMessage {
  readonly kind: typeof MessageKind.TEXT;
  readonly text: string;
}

export interface BinaryMessage {
  readonly kind: typeof MessageKind.BINARY;
  readonly data: Uint8Array;
}

export type TransportMessage = TextMessage | BinaryMessage;

export function textMessage(text: string): TextMessage {
  return { kind: MessageKind.TEXT, text };
}

export function binaryMessage(data: Uint8Array): BinaryMessage {
  return { kind: MessageKind.BINARY, data };
}

export function messageByteLength(message: TransportMessage): number {
  if (message.kind === MessageKind.TEXT) {
    return Buffer.byteLength(message.text, 'utf8');
  }
  return message.data.byteLength;
}

// ============================================================================
// Connection State
// ============================================================================

export const ConnectionState = {
  CONNECTING: 'CONNECTING',
  OPEN: 'OPEN',
  CLOSING: 'CLOSING',
  CLOSED: 'CLOSED',
  FAILED: 'FAILED',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface ConnectionStats {
  readonly state: ConnectionState;
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly lastMessageTime: number;
  readonly connectedAt: number | null;
}

export type StateHandler = (state: ConnectionState) => void;

// ============================================================================
// Raw Transport
// ============================================================================

export interface TransportRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly handshakeTimeoutMs: number;
}

/**
 * Callbacks a transport reports into. onClose fires once, after which no
 * other callback fires.
 */
export interface TransportHandlers {
  onOpen(): void;
  onMessage(message: TransportMessage): void;
  onError(error: unknown): void;
  onClose(code: number, reason: string): void;
}

/** One underlying duplex socket. Owned by exactly one Connection. */
export interface Transport {
  send(message: TransportMessage): Promise<void>;
  /** Graceful close handshake. */
  close(code: number, reason: string): void;
  /** Drop the socket immediately. */
  terminate(): void;
}

export type TransportFactory = (
  request: TransportRequest,
  handlers: TransportHandlers
) => Transport;

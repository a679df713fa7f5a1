/**
 * WebSocket transport backed by the `ws` package.
 *
 * Handles:
 * - Upgrade request with caller-supplied headers (Authorization)
 * - Text and binary frames, forwarded verbatim
 * - Mapping of a non-101 upgrade response to a typed handshake error
 *
 * FRAMING NOTE:
 * WebSocket has built-in message framing, so frames map 1:1 onto
 * TransportMessages. No length prefixes or codecs are applied here.
 *
 * @module transport/websocket-transport
 */

import WebSocket, { type RawData } from 'ws';

import { handshakeStatusError } from './errors.js';
import {
  binaryMessage,
  MessageKind,
  textMessage,
  type Transport,
  type TransportFactory,
  type TransportHandlers,
  type TransportMessage,
  type TransportRequest,
} from './types.js';

// ============================================================================
// Frame Conversion
// ============================================================================

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return data;
}

export function decodeFrame(data: RawData, isBinary: boolean): TransportMessage {
  const buffer = toBuffer(data);
  if (isBinary) {
    // Copy out of ws's pooled buffer so callers may keep the bytes.
    return binaryMessage(new Uint8Array(buffer));
  }
  return textMessage(buffer.toString('utf8'));
}

// ============================================================================
// WebSocket Transport
// ============================================================================

export const createWebSocketTransport: TransportFactory = (
  request: TransportRequest,
  handlers: TransportHandlers
): Transport => {
  const socket = new WebSocket(request.url, {
    headers: { ...request.headers },
    handshakeTimeout: request.handshakeTimeoutMs,
  });

  // --------------------------------------------------------------------------
  // Event Wiring
  // --------------------------------------------------------------------------

  socket.on('open', () => {
    handlers.onOpen();
  });

  socket.on('message', (data: RawData, isBinary: boolean) => {
    handlers.onMessage(decodeFrame(data, isBinary));
  });

  socket.on('unexpected-response', (_req, res) => {
    // With this listener installed ws leaves aborting the upgrade to us.
    handlers.onError(handshakeStatusError(res.statusCode ?? 0));
    res.resume();
    socket.terminate();
  });

  socket.on('error', (err: Error) => {
    handlers.onError(err);
  });

  socket.on('close', (code: number, reason: Buffer) => {
    handlers.onClose(code, reason.toString('utf8'));
  });

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  function send(message: TransportMessage): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const callback = (err?: Error): void => {
        if (err !== undefined && err !== null) {
          reject(err);
          return;
        }
        resolve();
      };

      if (message.kind === MessageKind.TEXT) {
        socket.send(message.text, callback);
      } else {
        socket.send(message.data, { binary: true }, callback);
      }
    });
  }

  function close(code: number, reason: string): void {
    socket.close(code, reason);
  }

  function terminate(): void {
    socket.terminate();
  }

  return { send, close, terminate };
};

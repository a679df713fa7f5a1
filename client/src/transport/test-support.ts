/**
 * In-process transport double for connector and connection tests.
 *
 * Each created transport runs the script for its attempt index on a
 * microtask, so the caller has registered its handlers before anything
 * is reported.
 *
 * @module transport/test-support
 */

import type {
  Transport,
  TransportFactory,
  TransportHandlers,
  TransportMessage,
  TransportRequest,
} from './types.js';

export interface CloseCall {
  readonly code: number;
  readonly reason: string;
}

export interface FakeTransport extends Transport {
  readonly request: TransportRequest;
  readonly sent: TransportMessage[];
  readonly closeCalls: CloseCall[];
  terminateCount(): number;
  open(): void;
  receive(message: TransportMessage): void;
  fail(error: unknown): void;
  serverClose(code: number, reason?: string): void;
}

export type FakeScript = (transport: FakeTransport) => void;

export interface FakeTransportOptions {
  /** Never answer a close() with onClose, like a peer that ignores the close frame. */
  readonly silentPeer?: boolean;
}

export interface FakeTransportFactory {
  readonly factory: TransportFactory;
  readonly transports: FakeTransport[];
  /** Date.now() at each factory call. */
  readonly createdAt: number[];
}

export const opens: FakeScript = (t) => t.open();
export const hangs: FakeScript = () => {};

export function failsWith(error: unknown): FakeScript {
  return (t) => t.fail(error);
}

export function connectionReset(): Error {
  return Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
}

function createFakeTransport(
  request: TransportRequest,
  handlers: TransportHandlers,
  options: FakeTransportOptions
): FakeTransport {
  const sent: TransportMessage[] = [];
  const closeCalls: CloseCall[] = [];
  let terminated = 0;
  let closed = false;

  function emitClose(code: number, reason: string): void {
    if (closed) {
      return;
    }
    closed = true;
    handlers.onClose(code, reason);
  }

  return {
    request,
    sent,
    closeCalls,
    terminateCount: () => terminated,
    send: (message) => {
      sent.push(message);
      return Promise.resolve();
    },
    close: (code, reason) => {
      closeCalls.push({ code, reason });
      if (options.silentPeer !== true) {
        emitClose(code, reason);
      }
    },
    terminate: () => {
      terminated += 1;
    },
    open: () => handlers.onOpen(),
    receive: (message) => handlers.onMessage(message),
    fail: (error) => handlers.onError(error),
    serverClose: (code, reason = '') => emitClose(code, reason),
  };
}

/**
 * Factory whose n-th transport runs scripts[n]; the last script repeats
 * for any further attempts.
 */
export function createFakeTransportFactory(
  scripts: readonly FakeScript[],
  options: FakeTransportOptions = {}
): FakeTransportFactory {
  const transports: FakeTransport[] = [];
  const createdAt: number[] = [];

  const factory: TransportFactory = (request, handlers) => {
    const transport = createFakeTransport(request, handlers, options);
    const script = scripts[Math.min(transports.length, scripts.length - 1)] ?? hangs;
    transports.push(transport);
    createdAt.push(Date.now());
    queueMicrotask(() => script(transport));
    return transport;
  };

  return { factory, transports, createdAt };
}

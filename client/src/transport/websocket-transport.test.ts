import { createServer, type IncomingMessage, type Server } from 'http';
import type { Duplex } from 'stream';
import { afterEach, describe, expect, it } from 'vitest';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';

import { silentLogger } from '../shared/logger.js';
import { TransportErrorCode } from './errors.js';
import { createResilientConnector } from './resilient-connector.js';
import { binaryMessage, ConnectionState, MessageKind, textMessage } from './types.js';
import { decodeFrame } from './websocket-transport.js';

describe('decodeFrame', () => {
  it('decodes text frames as UTF-8', () => {
    expect(decodeFrame(Buffer.from('héllo', 'utf8'), false)).toEqual({
      kind: MessageKind.TEXT,
      text: 'héllo',
    });
  });

  it('joins fragmented binary frames', () => {
    const message = decodeFrame([Buffer.from([1, 2]), Buffer.from([3])], true);

    expect(message).toEqual({ kind: MessageKind.BINARY, data: new Uint8Array([1, 2, 3]) });
  });

  it('accepts ArrayBuffer payloads', () => {
    const message = decodeFrame(new Uint8Array([7, 8]).buffer, true);

    expect(message).toEqual({ kind: MessageKind.BINARY, data: new Uint8Array([7, 8]) });
  });

  it('copies binary data out of the source buffer', () => {
    const source = Buffer.from([5, 6]);
    const message = decodeFrame(source, true);
    source[0] = 0;

    expect(message).toEqual({ kind: MessageKind.BINARY, data: new Uint8Array([5, 6]) });
  });
});

// ============================================================================
// Against an in-process server
// ============================================================================

interface TestServer {
  readonly url: string;
  upgrades(): number;
  authorizations(): (string | undefined)[];
}

type UpgradeMode = 'accept' | 'reject-401' | 'reset';

describe('createWebSocketTransport', () => {
  const servers: Server[] = [];
  const sockets = new Set<Duplex>();

  afterEach(async () => {
    for (const socket of sockets) {
      socket.destroy();
    }
    sockets.clear();
    await Promise.all(
      servers.splice(0).map(
        (server) => new Promise<void>((resolve) => server.close(() => resolve()))
      )
    );
  });

  async function startServer(mode: UpgradeMode): Promise<TestServer> {
    const server = createServer();
    const wss = new WebSocketServer({ noServer: true });
    const seenAuthorizations: (string | undefined)[] = [];
    let upgradeCount = 0;

    servers.push(server);
    server.on('connection', (socket: Duplex) => {
      sockets.add(socket);
    });

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      upgradeCount += 1;
      seenAuthorizations.push(req.headers.authorization);

      if (mode === 'reset') {
        socket.destroy();
        return;
      }

      if (mode === 'reject-401') {
        socket.end('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\nContent-Length: 0\r\n\r\n');
        return;
      }

      wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
        if (req.url === '/normal-close') {
          ws.close(1000);
          return;
        }
        if (req.url === '/evict') {
          ws.close(4000, 'evicted');
          return;
        }
        ws.on('message', (data: RawData, isBinary: boolean) => {
          ws.send(data, { binary: isBinary });
        });
      });
    });

    const port = await new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('server has no port'));
          return;
        }
        resolve(address.port);
      });
    });

    return {
      url: `ws://127.0.0.1:${port}`,
      upgrades: () => upgradeCount,
      authorizations: () => seenAuthorizations,
    };
  }

  function connector() {
    return createResilientConnector({
      logger: silentLogger,
      retryPolicy: { baseDelayMs: 10, maxDelayMs: 20, maxAttempts: 3, jitter: false },
    });
  }

  it('sends the bearer token and echoes text and binary frames', async () => {
    const server = await startServer('accept');
    const connection = await connector().connect(`${server.url}/rtc`, 'test-secret');
    const iterator = connection.messages();

    await connection.send(textMessage('ping'));
    await connection.send(binaryMessage(new Uint8Array([1, 2, 3])));
    const first = await iterator.next();
    const second = await iterator.next();

    expect(server.authorizations()).toEqual(['Bearer test-secret']);
    expect(first).toEqual({ done: false, value: textMessage('ping') });
    expect(second).toEqual({ done: false, value: binaryMessage(new Uint8Array([1, 2, 3])) });
    connection.close();
  });

  it('rejects a 401 upgrade as AUTH_REJECTED after one attempt', async () => {
    const server = await startServer('reject-401');

    await expect(connector().connect(`${server.url}/rtc`, 'test-secret')).rejects.toMatchObject({
      code: TransportErrorCode.AUTH_REJECTED,
      statusCode: 401,
    });
    expect(server.upgrades()).toBe(1);
  });

  it('retries a reset during the upgrade exactly maxAttempts times', async () => {
    const server = await startServer('reset');

    await expect(connector().connect(`${server.url}/rtc`, 'test-secret')).rejects.toMatchObject({
      code: TransportErrorCode.CONNECTION_RESET,
    });
    expect(server.upgrades()).toBe(3);
  });

  it('ends the stream on a normal server close', async () => {
    const server = await startServer('accept');
    const connection = await connector().connect(`${server.url}/normal-close`, 'test-secret');

    const received: unknown[] = [];
    for await (const message of connection.messages()) {
      received.push(message);
    }

    expect(received).toEqual([]);
    expect(connection.getState()).toBe(ConnectionState.CLOSED);
  });

  it('fails the stream on an application close code', async () => {
    const server = await startServer('accept');
    const connection = await connector().connect(`${server.url}/evict`, 'test-secret');

    await expect(connection.messages().next()).rejects.toMatchObject({
      code: TransportErrorCode.SERVER_CLOSED,
      closeCode: 4000,
    });
    expect(connection.getState()).toBe(ConnectionState.FAILED);
  });
});

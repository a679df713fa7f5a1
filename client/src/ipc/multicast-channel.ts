/**
 * UDP multicast notification channel.
 *
 * Joins a multicast group on the loopback interface with TTL 0, so
 * datagrams never leave the host. Every process on the host that joined
 * the group, the sender included, receives each datagram at most once.
 *
 * @module ipc/multicast-channel
 */

import { createSocket, type Socket as UdpSocket } from 'dgram';

import { createLogger, type Logger } from '../shared/logger.js';
import type { NotificationChannel } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_GROUP = '239.255.42.99';
const DEFAULT_PORT = 47999;
const DEFAULT_INTERFACE = '127.0.0.1';
const DEFAULT_TTL = 0;
const MAX_PAYLOAD_BYTES = 512;

// ============================================================================
// Types
// ============================================================================

export interface MulticastChannelConfig {
  readonly group: string;
  readonly port: number;
  readonly interfaceAddress: string;
  readonly ttl: number;
  readonly logger: Logger;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): MulticastChannelConfig {
  return {
    group: DEFAULT_GROUP,
    port: DEFAULT_PORT,
    interfaceAddress: DEFAULT_INTERFACE,
    ttl: DEFAULT_TTL,
    logger: createLogger('ipc'),
  };
}

// ============================================================================
// Multicast Channel
// ============================================================================

export function createMulticastChannel(
  configOverrides?: Partial<MulticastChannelConfig>
): NotificationChannel {
  const config: MulticastChannelConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new RangeError(`port must be an integer in 1..65535, got ${config.port}`);
  }
  if (!Number.isInteger(config.ttl) || config.ttl < 0 || config.ttl > 255) {
    throw new RangeError(`ttl must be an integer in 0..255, got ${config.ttl}`);
  }

  const { logger } = config;

  let socket: UdpSocket | null = null;
  let ready: Promise<void> | null = null;
  let abandonReady: ((err: Error) => void) | null = null;
  let joined = false;

  // --------------------------------------------------------------------------
  // Socket Setup
  // --------------------------------------------------------------------------

  function joinGroup(udp: UdpSocket): void {
    udp.setMulticastLoopback(true);
    udp.setMulticastTTL(config.ttl);
    udp.setMulticastInterface(config.interfaceAddress);
    udp.addMembership(config.group, config.interfaceAddress);
    joined = true;
    logger.debug(`Joined multicast group ${config.group}:${config.port}`);
  }

  function open(onPayload: (payload: string) => void): void {
    if (socket !== null) {
      return;
    }

    const udp = createSocket({ type: 'udp4', reuseAddr: true });
    socket = udp;

    ready = new Promise<void>((resolve, reject) => {
      abandonReady = reject;
      udp.once('listening', () => {
        try {
          joinGroup(udp);
          resolve();
        } catch (err) {
          reject(err);
        }
      });
      udp.once('error', reject);
    });

    ready.catch((err: unknown) => {
      if (socket === udp) {
        logger.warn('Failed to join multicast group:', err);
      }
    });

    udp.on('message', (msg: Buffer) => {
      if (msg.length > MAX_PAYLOAD_BYTES) {
        logger.warn(`Oversized notification datagram: ${msg.length} bytes`);
        return;
      }
      onPayload(msg.toString('utf8'));
    });

    udp.on('error', (err: Error) => {
      logger.error('UDP error:', err.message);
    });

    udp.bind(config.port);
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  async function send(payload: string): Promise<void> {
    const udp = socket;
    if (udp === null || ready === null) {
      throw new Error('Notification channel is not open');
    }

    await ready;

    await new Promise<void>((resolve, reject) => {
      udp.send(Buffer.from(payload, 'utf8'), config.port, config.group, (err) => {
        if (err !== null) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  function close(): void {
    const udp = socket;
    if (udp === null) {
      return;
    }
    socket = null;
    ready = null;
    // Sends still waiting for 'listening' must not wait forever.
    abandonReady?.(new Error('Notification channel closed'));
    abandonReady = null;

    if (joined) {
      try {
        udp.dropMembership(config.group, config.interfaceAddress);
      } catch (err) {
        logger.debug('dropMembership failed during close:', err);
      }
      joined = false;
    }

    udp.close();
  }

  return {
    open,
    send,
    close,
    isOpen: () => socket !== null,
  };
}

/**
 * In-process notification medium.
 *
 * Channels created from one hub behave like processes on one host joined to
 * the same multicast group: a payload sent on any open channel reaches every
 * open channel, the sender included. Delivery is synchronous.
 *
 * @module ipc/memory-hub
 */

import type { NotificationChannel } from './types.js';

export interface MemoryNotificationHub {
  createChannel(): NotificationChannel;
  /** While true, every payload is silently lost. */
  setDropping(dropping: boolean): void;
  openChannelCount(): number;
}

export function createMemoryNotificationHub(): MemoryNotificationHub {
  const listeners = new Set<(payload: string) => void>();
  let dropping = false;

  function createChannel(): NotificationChannel {
    let listener: ((payload: string) => void) | null = null;

    function open(onPayload: (payload: string) => void): void {
      if (listener !== null) {
        return;
      }
      listener = onPayload;
      listeners.add(onPayload);
    }

    function send(payload: string): Promise<void> {
      if (listener === null) {
        return Promise.reject(new Error('Notification channel is not open'));
      }
      if (!dropping) {
        for (const deliver of [...listeners]) {
          deliver(payload);
        }
      }
      return Promise.resolve();
    }

    function close(): void {
      if (listener === null) {
        return;
      }
      listeners.delete(listener);
      listener = null;
    }

    return {
      open,
      send,
      close,
      isOpen: () => listener !== null,
    };
  }

  return {
    createChannel,
    setDropping: (value) => {
      dropping = value;
    },
    openChannelCount: () => listeners.size,
  };
}

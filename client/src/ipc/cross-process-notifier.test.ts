import { describe, expect, it, vi } from 'vitest';

import { silentLogger, type Logger } from '../shared/logger.js';
import {
  createCrossProcessNotifier,
  decodeSignal,
  encodeSignal,
} from './cross-process-notifier.js';
import { createMemoryNotificationHub, type MemoryNotificationHub } from './memory-hub.js';
import { createMulticastChannel } from './multicast-channel.js';
import { CrossProcessSignal, type NotificationChannel } from './types.js';

function notifierOn(hub: MemoryNotificationHub, namespace = 'signal-resilience') {
  return createCrossProcessNotifier({
    channel: hub.createChannel(),
    namespace,
    logger: silentLogger,
  });
}

describe('createCrossProcessNotifier', () => {
  it('delivers a posted signal to subscribers in another notifier', () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const started = vi.fn();
    const stopped = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);
    host.subscribe(CrossProcessSignal.BROADCAST_STOPPED, stopped);

    helper.post(CrossProcessSignal.BROADCAST_STARTED);

    expect(started).toHaveBeenCalledTimes(1);
    expect(started).toHaveBeenCalledWith(CrossProcessSignal.BROADCAST_STARTED);
    expect(stopped).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const started = vi.fn();
    const unsubscribe = host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);

    unsubscribe();
    helper.post(CrossProcessSignal.BROADCAST_STARTED);

    expect(started).not.toHaveBeenCalled();
  });

  it('ignores other namespaces and unknown names', () => {
    const hub = createMemoryNotificationHub();
    const host = notifierOn(hub);
    const other = notifierOn(hub, 'other-app');
    const raw = hub.createChannel();
    raw.open(() => {});
    const started = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);

    other.post(CrossProcessSignal.BROADCAST_STARTED);
    void raw.send('signal-resilience:BROADCAST_PAUSED');

    expect(started).not.toHaveBeenCalled();
  });

  it('keeps delivering when one handler throws', () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const second = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STOPPED, () => {
      throw new Error('handler failed');
    });
    host.subscribe(CrossProcessSignal.BROADCAST_STOPPED, second);

    helper.post(CrossProcessSignal.BROADCAST_STOPPED);

    expect(second).toHaveBeenCalledTimes(1);
  });

  it('loses signals silently when the medium drops them', () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const started = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);

    hub.setDropping(true);
    helper.post(CrossProcessSignal.BROADCAST_STARTED);

    expect(started).not.toHaveBeenCalled();
  });

  it('logs a failed send instead of throwing', async () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const failing: NotificationChannel = {
      open: () => {},
      send: () => Promise.reject(new Error('send failed')),
      close: () => {},
      isOpen: () => true,
    };
    const notifier = createCrossProcessNotifier({ channel: failing, logger });

    expect(() => notifier.post(CrossProcessSignal.BROADCAST_STARTED)).not.toThrow();

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  it('streams signals until aborted', async () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const controller = new AbortController();
    const stream = host.signals(CrossProcessSignal.BROADCAST_STARTED, controller.signal);

    helper.post(CrossProcessSignal.BROADCAST_STARTED);
    helper.post(CrossProcessSignal.BROADCAST_STOPPED);
    helper.post(CrossProcessSignal.BROADCAST_STARTED);
    controller.abort();

    const received: CrossProcessSignal[] = [];
    for await (const signal of stream) {
      received.push(signal);
    }

    expect(received).toEqual([
      CrossProcessSignal.BROADCAST_STARTED,
      CrossProcessSignal.BROADCAST_STARTED,
    ]);
  });

  it('releases the channel and ends streams on close', async () => {
    const hub = createMemoryNotificationHub();
    const host = notifierOn(hub);
    const stream = host.signals(CrossProcessSignal.BROADCAST_STOPPED);
    expect(hub.openChannelCount()).toBe(1);

    host.close();
    host.close();

    expect(host.isClosed()).toBe(true);
    expect(hub.openChannelCount()).toBe(0);
    await expect(stream.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('drops posts after close', () => {
    const hub = createMemoryNotificationHub();
    const helper = notifierOn(hub);
    const host = notifierOn(hub);
    const started = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);

    helper.close();
    helper.post(CrossProcessSignal.BROADCAST_STARTED);

    expect(started).not.toHaveBeenCalled();
  });

  it('rejects a namespace containing the separator', () => {
    const hub = createMemoryNotificationHub();

    expect(() =>
      createCrossProcessNotifier({ channel: hub.createChannel(), namespace: 'a:b' })
    ).toThrow(RangeError);
  });
});

describe('signal wire format', () => {
  it('round-trips within a namespace only', () => {
    const payload = encodeSignal('signal-resilience', CrossProcessSignal.BROADCAST_STOPPED);

    expect(payload).toBe('signal-resilience:BROADCAST_STOPPED');
    expect(decodeSignal('signal-resilience', payload)).toBe(CrossProcessSignal.BROADCAST_STOPPED);
    expect(decodeSignal('other-app', payload)).toBeNull();
  });
});

describe('createMulticastChannel', () => {
  it('validates port and ttl without opening a socket', () => {
    expect(() => createMulticastChannel({ port: 0, logger: silentLogger })).toThrow(RangeError);
    expect(() => createMulticastChannel({ ttl: 256, logger: silentLogger })).toThrow(RangeError);
    expect(createMulticastChannel({ logger: silentLogger }).isOpen()).toBe(false);
  });

  it('releases a send waiting for the socket when closed', async () => {
    const channel = createMulticastChannel({ port: 47917, logger: silentLogger });
    channel.open(() => {});

    const pending = channel.send('signal-resilience:BROADCAST_STARTED');
    channel.close();

    await expect(pending).rejects.toThrow('Notification channel closed');
    expect(channel.isOpen()).toBe(false);
  });

  it('exchanges signals between two notifiers over loopback multicast', async () => {
    const helper = createCrossProcessNotifier({
      channel: createMulticastChannel({ port: 47918, logger: silentLogger }),
      logger: silentLogger,
    });
    const host = createCrossProcessNotifier({
      channel: createMulticastChannel({ port: 47918, logger: silentLogger }),
      logger: silentLogger,
    });
    const started = vi.fn();
    host.subscribe(CrossProcessSignal.BROADCAST_STARTED, started);

    try {
      // Delivery is best effort, so keep posting until the host has joined.
      await vi.waitFor(
        () => {
          helper.post(CrossProcessSignal.BROADCAST_STARTED);
          expect(started).toHaveBeenCalled();
        },
        { timeout: 5000, interval: 100 }
      );
      expect(started).toHaveBeenCalledWith(CrossProcessSignal.BROADCAST_STARTED);
    } finally {
      helper.close();
      host.close();
    }
  });

  it('refuses to send before open', async () => {
    const channel = createMulticastChannel({ logger: silentLogger });

    await expect(channel.send('signal-resilience:BROADCAST_STARTED')).rejects.toThrow(
      'Notification channel is not open'
    );
  });
});

/**
 * IPC module exports.
 *
 * Provides the cross-process notifier and the channels it runs over.
 *
 * @module ipc
 */

export {
  CrossProcessSignal,
  isCrossProcessSignal,
  type NotificationChannel,
  type SignalHandler,
} from './types.js';

export { createMulticastChannel, type MulticastChannelConfig } from './multicast-channel.js';

export { createMemoryNotificationHub, type MemoryNotificationHub } from './memory-hub.js';

export {
  createCrossProcessNotifier,
  decodeSignal,
  encodeSignal,
  type CrossProcessNotifier,
  type CrossProcessNotifierConfig,
} from './cross-process-notifier.js';

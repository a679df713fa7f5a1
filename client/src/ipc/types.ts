/**
 * Cross-process notification types.
 *
 * @module ipc/types
 */

// ============================================================================
// Signals
// ============================================================================

/**
 * Identity of a cross-process notification. The identity is the whole
 * content; no payload travels with it.
 */
export const CrossProcessSignal = {
  BROADCAST_STARTED: 'BROADCAST_STARTED',
  BROADCAST_STOPPED: 'BROADCAST_STOPPED',
} as const;

export type CrossProcessSignal = (typeof CrossProcessSignal)[keyof typeof CrossProcessSignal];

const KNOWN_SIGNALS: ReadonlySet<string> = new Set(Object.values(CrossProcessSignal));

export function isCrossProcessSignal(value: string): value is CrossProcessSignal {
  return KNOWN_SIGNALS.has(value);
}

export type SignalHandler = (signal: CrossProcessSignal) => void;

// ============================================================================
// Channel
// ============================================================================

/**
 * Unreliable datagram channel shared by cooperating processes. Every open
 * channel on the same medium, the sender included, may see a payload.
 */
export interface NotificationChannel {
  open(onPayload: (payload: string) => void): void;
  send(payload: string): Promise<void>;
  close(): void;
  isOpen(): boolean;
}

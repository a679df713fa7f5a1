/**
 * Connectivity monitor.
 *
 * Turns a noisy stream of path snapshots into two decision-grade signals:
 * - REACHABILITY_CHANGED: the network went away or came back
 * - NETWORK_SWITCHED: the path changed underneath a live network, or
 *   dropped and recovered within the debounce window (a migration candidate
 *   rather than a full reconnect)
 *
 * A loss is only reported once the debounce window expires without a
 * recovery. All snapshot processing and the debounce expiry run through one
 * serial executor; subscribers are called after the state update of the
 * task that produced their event.
 *
 * @module network/connectivity-monitor
 */

import { createAsyncQueue, type AsyncQueue } from '../shared/async-queue.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { createSerialExecutor } from '../shared/serial-executor.js';
import { createInterfacePollingSource } from './interface-source.js';
import {
  classifyInterface,
  describeSnapshot,
  pathDetailsChanged,
  snapshotsEqual,
  UNKNOWN_SNAPSHOT,
} from './path-snapshot.js';
import {
  ConnectivityEventType,
  MonitorPhase,
  type ConnectivityEvent,
  type ConnectivityHandler,
  type InterfaceClassifier,
  type InterfaceType,
  type NetworkPathSnapshot,
  type PathSource,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_DEBOUNCE_MS = 3000;
const MAX_SUBSCRIBERS = 64;

// ============================================================================
// Types
// ============================================================================

export interface ConnectivityMonitorConfig {
  readonly debounceMs: number;
  readonly source: PathSource;
  readonly classifyInterface: InterfaceClassifier;
  readonly logger: Logger;
}

export const Transition = {
  BASELINE: 'BASELINE',
  DROP: 'DROP',
  QUICK_RECOVERY: 'QUICK_RECOVERY',
  RECOVERY: 'RECOVERY',
  DETAIL_SWITCH: 'DETAIL_SWITCH',
  DETAIL_UPDATE: 'DETAIL_UPDATE',
} as const;

export type Transition = (typeof Transition)[keyof typeof Transition];

export interface ConnectivityMonitor {
  start(): void;
  stop(): void;
  isStarted(): boolean;
  /** Feed one path snapshot. The configured source calls this. */
  deliver(snapshot: NetworkPathSnapshot): void;
  subscribe(handler: ConnectivityHandler): () => void;
  events(signal?: AbortSignal): AsyncIterableIterator<ConnectivityEvent>;
  currentSnapshot(): NetworkPathSnapshot;
  activeInterfaceType(): InterfaceType | null;
  getPhase(): MonitorPhase;
  isPossiblySwitching(): boolean;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): ConnectivityMonitorConfig {
  const logger = createLogger('connectivity');
  return {
    debounceMs: DEFAULT_DEBOUNCE_MS,
    source: createInterfacePollingSource({ logger }),
    classifyInterface,
    logger,
  };
}

// ============================================================================
// Transition Table
// ============================================================================

/**
 * Which transition a new (already known to differ) snapshot triggers from
 * the current phase.
 */
export function classifyTransition(
  phase: MonitorPhase,
  possiblySwitching: boolean,
  previous: NetworkPathSnapshot,
  next: NetworkPathSnapshot
): Transition {
  switch (phase) {
    case MonitorPhase.UNKNOWN:
      return Transition.BASELINE;

    case MonitorPhase.SATISFIED:
      if (!next.reachable) {
        return Transition.DROP;
      }
      return pathDetailsChanged(previous, next)
        ? Transition.DETAIL_SWITCH
        : Transition.DETAIL_UPDATE;

    case MonitorPhase.UNSATISFIED:
      if (!next.reachable) {
        return Transition.DETAIL_UPDATE;
      }
      return possiblySwitching ? Transition.QUICK_RECOVERY : Transition.RECOVERY;
  }
}

function phaseOf(snapshot: NetworkPathSnapshot): MonitorPhase {
  return snapshot.reachable ? MonitorPhase.SATISFIED : MonitorPhase.UNSATISFIED;
}

// ============================================================================
// Connectivity Monitor
// ============================================================================

export function createConnectivityMonitor(
  configOverrides?: Partial<ConnectivityMonitorConfig>
): ConnectivityMonitor {
  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  const config: ConnectivityMonitorConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  if (!Number.isFinite(config.debounceMs) || config.debounceMs < 0) {
    throw new RangeError(`debounceMs must be a non-negative number, got ${config.debounceMs}`);
  }

  const { logger } = config;

  let started = false;
  let phase: MonitorPhase = MonitorPhase.UNKNOWN;
  let snapshot: NetworkPathSnapshot = UNKNOWN_SNAPSHOT;
  let possiblySwitching = false;
  let lastReportedReachable: boolean | null = null;
  let debounceTimeoutId: ReturnType<typeof setTimeout> | null = null;

  const handlers: (ConnectivityHandler | null)[] = new Array(MAX_SUBSCRIBERS).fill(null);
  // Open events() streams and their unsubscribe functions.
  const streams = new Map<AsyncQueue<ConnectivityEvent>, () => void>();

  const executor = createSerialExecutor((err) => {
    logger.error('Connectivity task failed:', err);
  });

  // --------------------------------------------------------------------------
  // Notification
  // --------------------------------------------------------------------------

  function dispatch(events: readonly ConnectivityEvent[]): void {
    for (const event of events) {
      logger.info(describeEvent(event));

      // Bounded loop
      for (let i = 0; i < MAX_SUBSCRIBERS; i += 1) {
        const handler = handlers[i];
        if (handler === null || handler === undefined) {
          continue;
        }
        try {
          handler(event);
        } catch (err) {
          logger.error('Connectivity subscriber threw:', err);
        }
      }
    }
  }

  function reportReachability(reachable: boolean, events: ConnectivityEvent[]): void {
    if (lastReportedReachable === reachable) {
      return;
    }
    lastReportedReachable = reachable;
    events.push({ type: ConnectivityEventType.REACHABILITY_CHANGED, reachable });
  }

  function reportSwitch(next: NetworkPathSnapshot, events: ConnectivityEvent[]): void {
    events.push({ type: ConnectivityEventType.NETWORK_SWITCHED, snapshot: next });
  }

  // --------------------------------------------------------------------------
  // Debounce Timer
  // --------------------------------------------------------------------------

  function armDebounce(): void {
    disarmDebounce();
    possiblySwitching = true;
    debounceTimeoutId = setTimeout(() => {
      debounceTimeoutId = null;
      executor.run(handleDebounceExpired);
    }, config.debounceMs);
  }

  function disarmDebounce(): void {
    if (debounceTimeoutId !== null) {
      clearTimeout(debounceTimeoutId);
      debounceTimeoutId = null;
    }
  }

  function handleDebounceExpired(): void {
    if (!started || !possiblySwitching) {
      return;
    }

    const events: ConnectivityEvent[] = [];
    possiblySwitching = false;
    logger.debug(`No recovery within ${config.debounceMs}ms, treating drop as disconnect`);
    reportReachability(false, events);

    dispatch(events);
  }

  // --------------------------------------------------------------------------
  // Snapshot Processing
  // --------------------------------------------------------------------------

  function applyTransition(
    transition: Transition,
    next: NetworkPathSnapshot,
    events: ConnectivityEvent[]
  ): void {
    switch (transition) {
      case Transition.BASELINE:
        reportReachability(next.reachable, events);
        break;

      case Transition.DROP:
        armDebounce();
        break;

      case Transition.QUICK_RECOVERY:
        disarmDebounce();
        possiblySwitching = false;
        reportSwitch(next, events);
        break;

      case Transition.RECOVERY:
        reportReachability(true, events);
        break;

      case Transition.DETAIL_SWITCH:
        reportSwitch(next, events);
        break;

      case Transition.DETAIL_UPDATE:
        break;
    }
  }

  function processSnapshot(next: NetworkPathSnapshot): void {
    if (!started) {
      return;
    }

    if (phase !== MonitorPhase.UNKNOWN && snapshotsEqual(snapshot, next)) {
      return;
    }

    const transition = classifyTransition(phase, possiblySwitching, snapshot, next);
    logger.debug(`Path update (${transition}): ${describeSnapshot(next)}`);

    const events: ConnectivityEvent[] = [];
    applyTransition(transition, next, events);

    snapshot = next;
    phase = phaseOf(next);

    dispatch(events);
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  function start(): void {
    if (started) {
      return;
    }
    started = true;

    phase = MonitorPhase.UNKNOWN;
    snapshot = UNKNOWN_SNAPSHOT;

    const initial = config.source.current();
    if (initial !== null) {
      snapshot = initial;
      phase = phaseOf(initial);
      lastReportedReachable = initial.reachable;
      logger.debug(`Baseline: ${describeSnapshot(initial)}`);
    }

    config.source.start(deliver);
  }

  function stop(): void {
    if (!started) {
      return;
    }
    started = false;

    config.source.stop();
    disarmDebounce();
    possiblySwitching = false;

    for (const [stream, unsubscribe] of streams) {
      unsubscribe();
      stream.end();
    }
    streams.clear();
  }

  function deliver(next: NetworkPathSnapshot): void {
    executor.run(() => processSnapshot(next));
  }

  function subscribe(handler: ConnectivityHandler): () => void {
    let slotIndex = -1;

    // Find empty slot (bounded loop)
    for (let i = 0; i < MAX_SUBSCRIBERS; i += 1) {
      if (handlers[i] === null) {
        slotIndex = i;
        break;
      }
    }

    if (slotIndex === -1) {
      logger.warn('Max connectivity subscribers reached');
      return () => {};
    }

    handlers[slotIndex] = handler;

    return () => {
      if (handlers[slotIndex] === handler) {
        handlers[slotIndex] = null;
      }
    };
  }

  function events(signal?: AbortSignal): AsyncIterableIterator<ConnectivityEvent> {
    let unsubscribe: () => void = () => {};

    function release(): void {
      unsubscribe();
      streams.delete(stream);
    }

    const stream = createAsyncQueue<ConnectivityEvent>({ onReturn: release });

    if (!started || signal?.aborted === true) {
      stream.end();
      return stream;
    }

    unsubscribe = subscribe((event) => stream.push(event));
    streams.set(stream, unsubscribe);

    signal?.addEventListener(
      'abort',
      () => {
        release();
        stream.end();
      },
      { once: true }
    );

    return stream;
  }

  function activeInterfaceType(): InterfaceType | null {
    if (snapshot.activeInterfaceId === null) {
      return null;
    }
    return config.classifyInterface(snapshot.activeInterfaceId);
  }

  return {
    start,
    stop,
    isStarted: () => started,
    deliver,
    subscribe,
    events,
    currentSnapshot: () => snapshot,
    activeInterfaceType,
    getPhase: () => phase,
    isPossiblySwitching: () => possiblySwitching,
  };
}

function describeEvent(event: ConnectivityEvent): string {
  if (event.type === ConnectivityEventType.REACHABILITY_CHANGED) {
    return `Reachability changed: ${event.reachable ? 'reachable' : 'unreachable'}`;
  }
  return `Network switched: ${describeSnapshot(event.snapshot)}`;
}

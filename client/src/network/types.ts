/**
 * Network path types shared by the connectivity monitor and path sources.
 *
 * @module network/types
 */

// ============================================================================
// Enums
// ============================================================================

export const InterfaceType = {
  WIFI: 'WIFI',
  CELLULAR: 'CELLULAR',
  WIRED_ETHERNET: 'WIRED_ETHERNET',
  LOOPBACK: 'LOOPBACK',
  OTHER: 'OTHER',
} as const;

export type InterfaceType = (typeof InterfaceType)[keyof typeof InterfaceType];

export const MonitorPhase = {
  UNKNOWN: 'UNKNOWN',
  SATISFIED: 'SATISFIED',
  UNSATISFIED: 'UNSATISFIED',
} as const;

export type MonitorPhase = (typeof MonitorPhase)[keyof typeof MonitorPhase];

export const ConnectivityEventType = {
  REACHABILITY_CHANGED: 'REACHABILITY_CHANGED',
  NETWORK_SWITCHED: 'NETWORK_SWITCHED',
} as const;

export type ConnectivityEventType =
  (typeof ConnectivityEventType)[keyof typeof ConnectivityEventType];

// ============================================================================
// Snapshot
// ============================================================================

export interface NetworkPathSnapshot {
  readonly reachable: boolean;
  readonly activeInterfaceId: string | null;
  readonly primaryLocalAddress: string | null;
}

// ============================================================================
// Events
// ============================================================================

export interface ReachabilityChangedEvent {
  readonly type: typeof ConnectivityEventType.REACHABILITY_CHANGED;
  readonly reachable: boolean;
}

export interface NetworkSwitchedEvent {
  readonly type: typeof ConnectivityEventType.NETWORK_SWITCHED;
  readonly snapshot: NetworkPathSnapshot;
}

export type ConnectivityEvent = ReachabilityChangedEvent | NetworkSwitchedEvent;

export type ConnectivityHandler = (event: ConnectivityEvent) => void;

// ============================================================================
// Path Source
// ============================================================================

/**
 * The OS reachability primitive as seen by the monitor. Implementations
 * deliver snapshots serially; they may repeat identical ones.
 */
export interface PathSource {
  /** Best-known snapshot right now, or null if the source cannot tell yet. */
  current(): NetworkPathSnapshot | null;
  start(onUpdate: (snapshot: NetworkPathSnapshot) => void): void;
  stop(): void;
}

export type InterfaceClassifier = (interfaceId: string) => InterfaceType;

/**
 * NetworkPathSnapshot construction, comparison and interface classification.
 *
 * @module network/path-snapshot
 */

import {
  InterfaceType,
  type InterfaceClassifier,
  type NetworkPathSnapshot,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Reported before any snapshot has been observed. */
export const UNKNOWN_SNAPSHOT: NetworkPathSnapshot = Object.freeze({
  reachable: false,
  activeInterfaceId: null,
  primaryLocalAddress: null,
});

// Ordered: first match wins. `en<N>` is the wired/primary port on Linux
// and usually Wi-Fi on macOS; callers on macOS can pass their own classifier.
const INTERFACE_PATTERNS: readonly (readonly [RegExp, InterfaceType])[] = [
  [/^lo\d*$/, InterfaceType.LOOPBACK],
  [/^(wl|wlan|wlp|wifi|ath|ra\d|awdl)/i, InterfaceType.WIFI],
  [/^(wwan|rmnet|pdp_ip|ccmni|wwp|usb)/i, InterfaceType.CELLULAR],
  [/^(eth|enp|eno|ens|enx|em\d|en\d|bond|Ethernet)/, InterfaceType.WIRED_ETHERNET],
  [/^Wi-?Fi/i, InterfaceType.WIFI],
];

// ============================================================================
// Snapshot
// ============================================================================

export function createSnapshot(
  input: Partial<NetworkPathSnapshot> & Pick<NetworkPathSnapshot, 'reachable'>
): NetworkPathSnapshot {
  return Object.freeze({
    reachable: input.reachable,
    activeInterfaceId: input.activeInterfaceId ?? null,
    primaryLocalAddress: input.primaryLocalAddress ?? null,
  });
}

export function snapshotsEqual(a: NetworkPathSnapshot, b: NetworkPathSnapshot): boolean {
  return (
    a.reachable === b.reachable &&
    a.activeInterfaceId === b.activeInterfaceId &&
    a.primaryLocalAddress === b.primaryLocalAddress
  );
}

/** Same reachability, but a different interface or local address. */
export function pathDetailsChanged(
  previous: NetworkPathSnapshot,
  next: NetworkPathSnapshot
): boolean {
  return (
    previous.activeInterfaceId !== next.activeInterfaceId ||
    previous.primaryLocalAddress !== next.primaryLocalAddress
  );
}

export function describeSnapshot(snapshot: NetworkPathSnapshot): string {
  const state = snapshot.reachable ? 'satisfied' : 'unsatisfied';
  const iface = snapshot.activeInterfaceId ?? '-';
  const address = snapshot.primaryLocalAddress ?? '-';
  return `${state} iface=${iface} local=${address}`;
}

// ============================================================================
// Classification
// ============================================================================

export const classifyInterface: InterfaceClassifier = (interfaceId) => {
  for (const [pattern, type] of INTERFACE_PATTERNS) {
    if (pattern.test(interfaceId)) {
      return type;
    }
  }
  return InterfaceType.OTHER;
};

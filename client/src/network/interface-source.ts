/**
 * PathSource backed by polling os.networkInterfaces().
 *
 * Node has no push-style reachability API, so the interface table is
 * sampled on an interval. Every sample is delivered, changed or not; the
 * monitor drops identical snapshots.
 *
 * @module network/interface-source
 */

import { networkInterfaces, type NetworkInterfaceInfo } from 'os';

import { createLogger, type Logger } from '../shared/logger.js';
import { classifyInterface, createSnapshot } from './path-snapshot.js';
import {
  InterfaceType,
  type InterfaceClassifier,
  type NetworkPathSnapshot,
  type PathSource,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_POLL_INTERVAL_MS = 2000;

const INTERFACE_RANK: Record<InterfaceType, number> = {
  WIRED_ETHERNET: 0,
  WIFI: 1,
  CELLULAR: 2,
  OTHER: 3,
  LOOPBACK: 4,
};

// ============================================================================
// Types
// ============================================================================

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface InterfacePollingSourceConfig {
  readonly pollIntervalMs: number;
  readonly readInterfaces: () => InterfaceTable;
  readonly classifyInterface: InterfaceClassifier;
  readonly logger: Logger;
}

interface Candidate {
  readonly id: string;
  readonly rank: number;
  readonly order: number;
  readonly address: string;
}

// ============================================================================
// Default Configuration
// ============================================================================

function createDefaultConfig(): InterfacePollingSourceConfig {
  return {
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    readInterfaces: networkInterfaces,
    classifyInterface,
    logger: createLogger('connectivity'),
  };
}

// ============================================================================
// Derivation
// ============================================================================

function isUsableAddress(info: NetworkInterfaceInfo): boolean {
  if (info.internal) {
    return false;
  }
  // Link-local IPv6 exists on every up interface, routable or not.
  if (info.family === 'IPv6' && info.address.toLowerCase().startsWith('fe80:')) {
    return false;
  }
  return true;
}

function pickAddress(infos: readonly NetworkInterfaceInfo[]): string | null {
  const usable = infos.filter(isUsableAddress);
  const ipv4 = usable.find((info) => info.family === 'IPv4');
  if (ipv4 !== undefined) {
    return ipv4.address;
  }
  return usable[0]?.address ?? null;
}

/**
 * Reduce an interface table to a snapshot: the best-ranked interface with a
 * routable address is active; none means unreachable.
 */
export function deriveSnapshot(
  table: InterfaceTable,
  classify: InterfaceClassifier = classifyInterface
): NetworkPathSnapshot {
  const candidates: Candidate[] = [];
  let order = 0;

  for (const [id, infos] of Object.entries(table)) {
    order += 1;
    if (infos === undefined) {
      continue;
    }

    const type = classify(id);
    if (type === InterfaceType.LOOPBACK) {
      continue;
    }

    const address = pickAddress(infos);
    if (address === null) {
      continue;
    }

    candidates.push({ id, rank: INTERFACE_RANK[type], order, address });
  }

  candidates.sort((a, b) => a.rank - b.rank || a.order - b.order);

  const best = candidates[0];
  if (best === undefined) {
    return createSnapshot({ reachable: false });
  }

  return createSnapshot({
    reachable: true,
    activeInterfaceId: best.id,
    primaryLocalAddress: best.address,
  });
}

// ============================================================================
// Polling Source
// ============================================================================

export function createInterfacePollingSource(
  configOverrides?: Partial<InterfacePollingSourceConfig>
): PathSource {
  const config: InterfacePollingSourceConfig = {
    ...createDefaultConfig(),
    ...configOverrides,
  };

  if (!Number.isFinite(config.pollIntervalMs) || config.pollIntervalMs <= 0) {
    throw new RangeError(`pollIntervalMs must be positive, got ${config.pollIntervalMs}`);
  }

  let intervalId: ReturnType<typeof setInterval> | null = null;
  let last: NetworkPathSnapshot | null = null;

  function sample(): NetworkPathSnapshot | null {
    try {
      last = deriveSnapshot(config.readInterfaces(), config.classifyInterface);
    } catch (err) {
      // The monitor goes stale rather than failing; keep the last sample.
      config.logger.warn('Failed to read network interfaces:', err);
    }
    return last;
  }

  function current(): NetworkPathSnapshot | null {
    return sample();
  }

  function start(onUpdate: (snapshot: NetworkPathSnapshot) => void): void {
    if (intervalId !== null) {
      return;
    }

    intervalId = setInterval(() => {
      const snapshot = sample();
      if (snapshot !== null) {
        onUpdate(snapshot);
      }
    }, config.pollIntervalMs);
    intervalId.unref();
  }

  function stop(): void {
    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }
  }

  return { current, start, stop };
}

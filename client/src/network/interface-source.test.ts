import type { NetworkInterfaceInfo } from 'os';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { silentLogger } from '../shared/logger.js';
import {
  createInterfacePollingSource,
  deriveSnapshot,
  type InterfaceTable,
} from './interface-source.js';
import { classifyInterface, createSnapshot } from './path-snapshot.js';
import { InterfaceType, type NetworkPathSnapshot } from './types.js';

function ipv4(address: string, internal = false): NetworkInterfaceInfo {
  return {
    address,
    netmask: '255.255.255.0',
    family: 'IPv4',
    mac: '00:00:00:00:00:00',
    internal,
    cidr: `${address}/24`,
  };
}

function ipv6(address: string): NetworkInterfaceInfo {
  return {
    address,
    netmask: 'ffff:ffff:ffff:ffff::',
    family: 'IPv6',
    mac: '00:00:00:00:00:00',
    internal: false,
    cidr: `${address}/64`,
    scopeid: 0,
  };
}

describe('deriveSnapshot', () => {
  it('is unreachable with only loopback', () => {
    const table: InterfaceTable = { lo: [ipv4('127.0.0.1', true)] };

    expect(deriveSnapshot(table)).toEqual({
      reachable: false,
      activeInterfaceId: null,
      primaryLocalAddress: null,
    });
  });

  it('prefers wired over wifi regardless of table order', () => {
    const table: InterfaceTable = {
      wlan0: [ipv4('192.168.1.20')],
      eth0: [ipv4('10.1.0.5')],
    };

    expect(deriveSnapshot(table)).toEqual({
      reachable: true,
      activeInterfaceId: 'eth0',
      primaryLocalAddress: '10.1.0.5',
    });
  });

  it('prefers an IPv4 address on the chosen interface', () => {
    const table: InterfaceTable = {
      wlan0: [ipv6('2001:db8::20'), ipv4('192.168.1.20')],
    };

    expect(deriveSnapshot(table).primaryLocalAddress).toBe('192.168.1.20');
  });

  it('skips interfaces with only link-local IPv6', () => {
    const table: InterfaceTable = {
      eth0: [ipv6('fe80::1')],
      rmnet0: [ipv6('2001:db8::9')],
    };

    expect(deriveSnapshot(table)).toEqual({
      reachable: true,
      activeInterfaceId: 'rmnet0',
      primaryLocalAddress: '2001:db8::9',
    });
  });
});

describe('classifyInterface', () => {
  it('recognises common interface names', () => {
    expect(classifyInterface('lo')).toBe(InterfaceType.LOOPBACK);
    expect(classifyInterface('wlp2s0')).toBe(InterfaceType.WIFI);
    expect(classifyInterface('Wi-Fi')).toBe(InterfaceType.WIFI);
    expect(classifyInterface('pdp_ip0')).toBe(InterfaceType.CELLULAR);
    expect(classifyInterface('enp3s0')).toBe(InterfaceType.WIRED_ETHERNET);
    expect(classifyInterface('utun3')).toBe(InterfaceType.OTHER);
  });
});

describe('createInterfacePollingSource', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('samples the table on every interval', () => {
    let table: InterfaceTable = { eth0: [ipv4('10.1.0.5')] };
    const source = createInterfacePollingSource({
      pollIntervalMs: 1000,
      readInterfaces: () => table,
      logger: silentLogger,
    });
    const seen: NetworkPathSnapshot[] = [];

    source.start((snapshot) => seen.push(snapshot));
    vi.advanceTimersByTime(1000);
    table = {};
    vi.advanceTimersByTime(1000);
    source.stop();
    vi.advanceTimersByTime(5000);

    expect(seen).toEqual([
      createSnapshot({ reachable: true, activeInterfaceId: 'eth0', primaryLocalAddress: '10.1.0.5' }),
      createSnapshot({ reachable: false }),
    ]);
  });

  it('keeps the last sample when the table cannot be read', () => {
    let fail = false;
    const source = createInterfacePollingSource({
      readInterfaces: () => {
        if (fail) {
          throw new Error('interface table unavailable');
        }
        return { eth0: [ipv4('10.1.0.5')] };
      },
      logger: silentLogger,
    });

    const first = source.current();
    fail = true;

    expect(source.current()).toEqual(first);
  });

  it('returns null before any successful sample', () => {
    const source = createInterfacePollingSource({
      readInterfaces: () => {
        throw new Error('interface table unavailable');
      },
      logger: silentLogger,
    });

    expect(source.current()).toBeNull();
  });

  it('rejects a non-positive poll interval', () => {
    expect(() => createInterfacePollingSource({ pollIntervalMs: 0 })).toThrow(RangeError);
  });
});

/**
 * Network module exports.
 *
 * Provides the connectivity monitor and the path sources that feed it.
 *
 * @module network
 */

// ============================================================================
// Types
// ============================================================================

export {
  ConnectivityEventType,
  InterfaceType,
  MonitorPhase,
  type ConnectivityEvent,
  type ConnectivityHandler,
  type InterfaceClassifier,
  type NetworkPathSnapshot,
  type NetworkSwitchedEvent,
  type PathSource,
  type ReachabilityChangedEvent,
} from './types.js';

// ============================================================================
// Snapshots
// ============================================================================

export {
  classifyInterface,
  createSnapshot,
  describeSnapshot,
  pathDetailsChanged,
  snapshotsEqual,
  UNKNOWN_SNAPSHOT,
} from './path-snapshot.js';

export {
  createInterfacePollingSource,
  deriveSnapshot,
  type InterfacePollingSourceConfig,
  type InterfaceTable,
} from './interface-source.js';

// ============================================================================
// Connectivity Monitor
// ============================================================================

export {
  classifyTransition,
  createConnectivityMonitor,
  Transition,
  type ConnectivityMonitor,
  type ConnectivityMonitorConfig,
} from './connectivity-monitor.js';

/**
 * signal-resilience public API.
 *
 * Three independent pieces, composed by the caller:
 * - network: debounced connectivity signals (reachability, network switch)
 * - transport: retrying connector producing a duplex message Connection
 * - ipc: best-effort signals between cooperating processes
 *
 * @module signal-resilience
 */

export * from './network/index.js';
export * from './transport/index.js';
export * from './ipc/index.js';

export {
  createLogger,
  getLogLevel,
  LogLevel,
  setLogLevel,
  silentLogger,
  type Logger,
} from './shared/logger.js';

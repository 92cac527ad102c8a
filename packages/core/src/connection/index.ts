/**
 * Connection Module
 *
 * Base class for driver connections, the driver registry and the
 * named-connection manager.
 *
 * @module connection
 */

export {
  BaseConnection,
  type ConnectionOptions,
  type ConnectionEvents,
  type QueryEvent,
  type QueryErrorEvent,
} from './base-connection';
export { StatementResult } from './exec-result';
export {
  registerDriver,
  resolveDriver,
  unregisterDriver,
  type ConnectionFactory,
} from './driver-registry';
export { DatabaseManager, type DatabaseManagerOptions } from './manager';

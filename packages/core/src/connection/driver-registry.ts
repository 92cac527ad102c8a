import { normalizeDriver } from '../grammar/grammar-factory';

import type { BaseConnection, ConnectionOptions } from './base-connection';
import type { GrammarDriver } from '../grammar/grammar';
import type { ConnectionConfig } from '../types';

export type ConnectionFactory = (
  name: string,
  config: ConnectionConfig,
  options: ConnectionOptions,
) => BaseConnection;

const factories = new Map<GrammarDriver, ConnectionFactory>();

/**
 * Register the connection factory used for a driver and all of its aliases
 * (`pgsql`, `postgres` and `postgresql` share one entry). Driver packages
 * call this from their `register()` export.
 */
export function registerDriver(driver: string, factory: ConnectionFactory): void {
  factories.set(normalizeDriver(driver), factory);
}

export function resolveDriver(driver: string): ConnectionFactory | undefined {
  return factories.get(normalizeDriver(driver));
}

export function unregisterDriver(driver: string): void {
  factories.delete(normalizeDriver(driver));
}

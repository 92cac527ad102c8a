/**
 * Logging helpers shared by connections and the manager.
 *
 * Any object with `debug`, `info`, `warn` and `error` satisfies {@link Logger};
 * `console` itself works.
 */

import type { Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[querywright] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[querywright] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[querywright] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[querywright] ${msg}`, ...args),
};
/* eslint-enable no-console */

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}

/**
 * Serialize bindings for a log line; bigint values are written as strings
 */
export function formatParams(params: readonly unknown[], maxLength = 100): string {
  const str = JSON.stringify(params, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}

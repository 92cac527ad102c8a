export { retry, withTimeout, sleep, toError, isTransientError, type RetryOptions } from './retry';
export { generateUUID } from './uuid';
export { runWithContext } from './execution-context';

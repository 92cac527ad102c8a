export type { ExecutionHandle, TransactionHandle } from './execution-handle';

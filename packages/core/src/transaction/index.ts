/**
 * Transaction Module
 *
 * Base transaction class for driver packages.
 *
 * @module transaction
 */

export {
  BaseTransaction,
  type TransactionOwner,
} from './base-transaction';

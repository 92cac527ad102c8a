import { Grammar } from './grammar';

/**
 * Fallback grammar for drivers without a dedicated dialect:
 * double-quoted identifiers and `?` placeholders.
 */
export class BaseGrammar extends Grammar {
  readonly driver = 'base' as const;
}

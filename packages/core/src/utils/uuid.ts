import { randomUUID } from 'node:crypto';

/**
 * Random (v4) UUID used to tag transactions in logs and errors
 */
export function generateUUID(): string {
  return randomUUID();
}

/**
 * A literal SQL fragment that compilers emit as text instead of binding it.
 * `?` markers inside the fragment are bound to `bindings`, in order.
 *
 * @example
 * ```typescript
 * await db.table('posts').where('id', '=', 7).update({ views: raw('"views" + 1') });
 * // UPDATE "posts" SET "views" = "views" + 1 WHERE "id" = ?
 * ```
 */
export class RawExpression {
  readonly bindings: readonly unknown[];

  constructor(readonly sql: string, bindings: readonly unknown[] = []) {
    this.bindings = [...bindings];
  }

  toString(): string {
    return this.sql;
  }
}

export function raw(sql: string, bindings: readonly unknown[] = []): RawExpression {
  return new RawExpression(sql, bindings);
}

export type Bindable =
  | { kind: 'literal'; sql: string; bindings: readonly unknown[] }
  | { kind: 'bound'; value: unknown };

/**
 * Classify a value destined for a SET list or VALUES tuple.
 */
export function toBindable(value: unknown): Bindable {
  if (value instanceof RawExpression) {
    return { kind: 'literal', sql: value.sql, bindings: value.bindings };
  }
  return { kind: 'bound', value };
}

import { types } from 'pg';

/**
 * Install pg type parsers: INT8 becomes a number while it stays a safe
 * integer, floats and NUMERIC become numbers, date types become Dates.
 * The parsers are process-wide in pg.
 */
export function configurePgTypes(): void {
  types.setTypeParser(types.builtins.INT8, parseInt8);

  types.setTypeParser(types.builtins.FLOAT4, (val: string) => parseFloat(val));
  types.setTypeParser(types.builtins.FLOAT8, (val: string) => parseFloat(val));
  types.setTypeParser(types.builtins.NUMERIC, (val: string) => parseFloat(val));

  types.setTypeParser(types.builtins.DATE, (val: string) => new Date(val));
  types.setTypeParser(types.builtins.TIMESTAMP, (val: string) => new Date(val));
  types.setTypeParser(types.builtins.TIMESTAMPTZ, (val: string) => new Date(val));
}

export function parseInt8(val: string): number | string {
  const num = parseInt(val, 10);
  return Number.isSafeInteger(num) ? num : val;
}

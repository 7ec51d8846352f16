/**
 * Server-side reading of document filter expressions, as the simulator
 * evaluates them.
 */

export type FilterOp = '=' | '>' | '>=';

export interface Filter {
  field: string;
  op: FilterOp;
  value: string | number;
}

/**
 * Parses a raw `expr` query value. The left operand is always taken as the
 * field. Returns `undefined` for the empty expression, which matches all.
 */
export function parseFilter(raw: string): Filter | undefined {
  const text = raw.replace(/%22/gi, '"').replace(/%3e/gi, '>');
  if (text === '') {
    return undefined;
  }
  const match = /^([^=>]+)(>=|>|=)(.+)$/.exec(text);
  if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) {
    throw new Error(`invalid expression: ${text}`);
  }
  return { field: match[1], op: toOp(match[2]), value: parseValue(match[3]) };
}

/**
 * Returns true when the document satisfies the filter.
 */
export function matchesFilter(doc: Record<string, unknown>, filter: Filter | undefined): boolean {
  if (filter === undefined) {
    return true;
  }
  const actual = doc[filter.field];
  if (filter.op === '=') {
    return actual === filter.value;
  }
  const expected = filter.value;
  if (typeof actual === 'number' && typeof expected === 'number') {
    return filter.op === '>' ? actual > expected : actual >= expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return filter.op === '>' ? actual > expected : actual >= expected;
  }
  return false;
}

function toOp(op: string): FilterOp {
  switch (op) {
    case '=':
    case '>':
    case '>=':
      return op;
    default:
      throw new Error(`invalid operator: ${op}`);
  }
}

function parseValue(raw: string): string | number {
  const quoted = /^"(.*)"$/.exec(raw);
  if (quoted && quoted[1] !== undefined) {
    return quoted[1];
  }
  const n = Number(raw);
  if (Number.isNaN(n)) {
    throw new Error(`invalid value: ${raw}`);
  }
  return n;
}

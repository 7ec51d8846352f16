/**
 * Document filter expression tree.
 */

export type ExprValue =
  | { kind: 'str'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'map' };

export type ComparisonOp = 'eq' | 'gt' | 'gte' | 'lt' | 'lte';

export type Expr =
  | { kind: 'all' }
  | { kind: ComparisonOp; field: string; value: ExprValue }
  | { kind: 'and'; left: Expr; right: Expr }
  | { kind: 'or'; left: Expr; right: Expr };

/**
 * Value constructors.
 */
export const Value = {
  str(value: string): ExprValue {
    return { kind: 'str', value };
  },
  number(value: number): ExprValue {
    return { kind: 'number', value };
  },
  map(): ExprValue {
    return { kind: 'map' };
  },
} as const;

/**
 * Expression constructors.
 *
 * @example
 * ```typescript
 * const expr = Expr.gt('age', Value.number(30));
 * ```
 */
export const Expr = {
  all(): Expr {
    return { kind: 'all' };
  },
  eq(field: string, value: ExprValue): Expr {
    return { kind: 'eq', field, value };
  },
  gt(field: string, value: ExprValue): Expr {
    return { kind: 'gt', field, value };
  },
  gte(field: string, value: ExprValue): Expr {
    return { kind: 'gte', field, value };
  },
  lt(field: string, value: ExprValue): Expr {
    return { kind: 'lt', field, value };
  },
  lte(field: string, value: ExprValue): Expr {
    return { kind: 'lte', field, value };
  },
  and(left: Expr, right: Expr): Expr {
    return { kind: 'and', left, right };
  },
  or(left: Expr, right: Expr): Expr {
    return { kind: 'or', left, right };
  },
} as const;

export { Expr, Value } from './types';
export type { ExprValue, ComparisonOp } from './types';
export { compileExpression } from './compiler';

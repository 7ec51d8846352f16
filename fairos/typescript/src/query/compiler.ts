/**
 * Compiles filter expressions into the document store's `expr` query value.
 *
 * The output is already URL-safe and must be placed in the query string as is:
 * `%22` wraps string literals and `%3e` stands for `>`. The server has no `<`
 * operator, so `lt`/`lte` are written with the operands swapped (`9%3en`).
 * That form is kept byte for byte for compatibility with the deployed server.
 */

import { FairOSError } from '../errors';
import type { Expr, ExprValue } from './types';

const U32_MAX = 0xffff_ffff;

function compileValue(value: ExprValue): string {
  switch (value.kind) {
    case 'str':
      return `%22${value.value}%22`;
    case 'number':
      if (!Number.isInteger(value.value) || value.value < 0 || value.value > U32_MAX) {
        throw FairOSError.validation(
          `Expression numbers must be unsigned 32-bit integers, got ${value.value}`,
          'value'
        );
      }
      return String(value.value);
    case 'map':
      throw FairOSError.unsupportedExpression('Map values cannot be used in expressions');
  }
}

export function compileExpression(expr: Expr): string {
  switch (expr.kind) {
    case 'all':
      return '';
    case 'eq':
      return `${expr.field}=${compileValue(expr.value)}`;
    case 'gt':
      return `${expr.field}%3e${compileValue(expr.value)}`;
    case 'gte':
      return `${expr.field}%3e=${compileValue(expr.value)}`;
    case 'lt':
      return `${compileValue(expr.value)}%3e${expr.field}`;
    case 'lte':
      return `${compileValue(expr.value)}%3e=${expr.field}`;
    case 'and':
    case 'or':
      throw FairOSError.unsupportedExpression(
        `"${expr.kind}" expressions are not supported by the document store query syntax`
      );
  }
}

/**
 * Tests for the document filter compiler.
 */

import { describe, expect, it } from 'vitest';
import { FairOSErrorCode } from '../errors';
import { Expr, Value, compileExpression } from '../query';
import { errorOf } from './helpers';

describe('compileExpression', () => {
  it('compiles equality on strings with encoded quotes', () => {
    expect(compileExpression(Expr.eq('name', Value.str('bob')))).toBe('name=%22bob%22');
  });

  it('compiles equality on numbers', () => {
    expect(compileExpression(Expr.eq('age', Value.number(30)))).toBe('age=30');
  });

  it('compiles greater-than forms', () => {
    expect(compileExpression(Expr.gt('age', Value.number(30)))).toBe('age%3e30');
    expect(compileExpression(Expr.gte('age', Value.number(30)))).toBe('age%3e=30');
  });

  it('writes less-than forms with the operands swapped', () => {
    expect(compileExpression(Expr.lt('n', Value.number(9)))).toBe('9%3en');
    expect(compileExpression(Expr.lte('n', Value.number(9)))).toBe('9%3e=n');
    expect(compileExpression(Expr.lt('tag', Value.str('m')))).toBe('%22m%22%3etag');
  });

  it('compiles the match-all expression to an empty string', () => {
    expect(compileExpression(Expr.all())).toBe('');
  });

  it('rejects conjunctions and disjunctions', () => {
    const and = Expr.and(Expr.eq('a', Value.number(1)), Expr.eq('b', Value.number(2)));
    const or = Expr.or(Expr.eq('a', Value.number(1)), Expr.eq('b', Value.number(2)));

    expect(errorOf(() => compileExpression(and)).code).toBe(FairOSErrorCode.UnsupportedExpression);
    expect(errorOf(() => compileExpression(or)).code).toBe(FairOSErrorCode.UnsupportedExpression);
  });

  it('rejects map values', () => {
    const error = errorOf(() => compileExpression(Expr.eq('meta', Value.map())));
    expect(error.code).toBe(FairOSErrorCode.UnsupportedExpression);
  });

  it('rejects numbers outside the unsigned 32-bit range', () => {
    expect(errorOf(() => compileExpression(Expr.gt('n', Value.number(-1)))).code).toBe(
      FairOSErrorCode.Validation
    );
    expect(errorOf(() => compileExpression(Expr.gt('n', Value.number(1.5)))).code).toBe(
      FairOSErrorCode.Validation
    );
    expect(errorOf(() => compileExpression(Expr.gt('n', Value.number(2 ** 32)))).code).toBe(
      FairOSErrorCode.Validation
    );
  });

  it('accepts the largest unsigned 32-bit number', () => {
    expect(compileExpression(Expr.gt('n', Value.number(4294967295)))).toBe('n%3e4294967295');
  });
});

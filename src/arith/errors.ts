import type { Location } from '../utils/types.js';

export type ArithmeticErrorCode =
  | 'LEX_ERROR'
  | 'UNKNOWN_OPERATOR'
  | 'INVALID_OPERAND'
  | 'UNMATCHED_PARENTHESIS'
  | 'EMPTY_EXPRESSION'
  | 'MALFORMED_EXPRESSION'
  | 'DIVISION_BY_ZERO'
  | 'NESTING_TOO_DEEP';

export interface ErrorDetails {
  location?: Location;
}

/**
 * Base class for every failure raised while tokenizing, building or
 * evaluating an expression. All of them are recoverable by the caller.
 */
export abstract class ArithmeticError extends Error {
  abstract readonly code: ArithmeticErrorCode;
  readonly location?: Location;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.location = details.location;
  }
}

export class LexError extends ArithmeticError {
  readonly code = 'LEX_ERROR';
  readonly found: string;

  constructor(found: string, details: ErrorDetails = {}) {
    super(`Unexpected character '${found}'`, details);
    this.found = found;
  }
}

export class UnknownOperatorError extends ArithmeticError {
  readonly code = 'UNKNOWN_OPERATOR';
  readonly symbol: string;

  constructor(symbol: string, details: ErrorDetails = {}) {
    super(`Unknown operator '${symbol}', expected one of + - * /`, details);
    this.symbol = symbol;
  }
}

export class InvalidOperandError extends ArithmeticError {
  readonly code = 'INVALID_OPERAND';
  readonly operand: string;

  constructor(operand: string, reason = 'is not a decimal number', details: ErrorDetails = {}) {
    super(`Operand '${operand}' ${reason}`, details);
    this.operand = operand;
  }
}

export class UnmatchedParenthesisError extends ArithmeticError {
  readonly code = 'UNMATCHED_PARENTHESIS';
  readonly parenthesis: '(' | ')';

  constructor(parenthesis: '(' | ')', details: ErrorDetails = {}) {
    super(
      parenthesis === '('
        ? "Unclosed '(' at end of input"
        : "Unexpected ')' without a matching '('",
      details
    );
    this.parenthesis = parenthesis;
  }
}

export class EmptyExpressionError extends ArithmeticError {
  readonly code = 'EMPTY_EXPRESSION';

  constructor(message = 'Expression is empty', details: ErrorDetails = {}) {
    super(message, details);
  }
}

export class MalformedExpressionError extends ArithmeticError {
  readonly code = 'MALFORMED_EXPRESSION';
}

export class DivisionByZeroError extends ArithmeticError {
  readonly code = 'DIVISION_BY_ZERO';
  readonly dividend: number;

  constructor(dividend: number, details: ErrorDetails = {}) {
    super(`Division by zero (${dividend} / 0)`, details);
    this.dividend = dividend;
  }
}

export class NestingTooDeepError extends ArithmeticError {
  readonly code = 'NESTING_TOO_DEEP';
  readonly maxDepth: number;

  constructor(maxDepth: number, details: ErrorDetails = {}) {
    super(`Parentheses nested deeper than ${maxDepth} levels`, details);
    this.maxDepth = maxDepth;
  }
}

export function isArithmeticError(err: unknown): err is ArithmeticError {
  return err instanceof ArithmeticError;
}

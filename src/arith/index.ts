export { Operator, type OperatorName, type OperatorSymbol } from './operator.js';
export { Expression, NumberLiteral, type Operand, type OperandNode } from './expression.js';
export { ExpressionBuilder, build, evaluate, type BuildOptions } from './builder.js';
export {
  ArithmeticError,
  LexError,
  UnknownOperatorError,
  InvalidOperandError,
  UnmatchedParenthesisError,
  EmptyExpressionError,
  MalformedExpressionError,
  DivisionByZeroError,
  NestingTooDeepError,
  isArithmeticError,
  type ArithmeticErrorCode,
  type ErrorDetails,
} from './errors.js';

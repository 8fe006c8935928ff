// src/index.ts
// ============================================
// 🌐 safe-arith Main API Surface (Public Entry)
// ============================================

// 🧮 Operators, Expression Trees and Building
export {
  Operator,
  Expression,
  NumberLiteral,
  ExpressionBuilder,
  build,
  evaluate,
  type OperatorName,
  type OperatorSymbol,
  type Operand,
  type OperandNode,
  type BuildOptions,
} from './arith/index.js';

// 🚨 Errors
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
} from './arith/index.js';

// 🔤 Tokenization
export { tokenize, type ArithToken, type ArithTokenType } from './lexer/index.js';

// ⚙️ Configuration
export {
  defaultSettings,
  resolveSettings,
  type EvaluatorSettings,
  type SettingsEnv,
} from './config.js';

// 🎲 Puzzle Search
export {
  generateExpression,
  findExpression,
  type GenerateOptions,
  type SolveOptions,
  type SolveAttempt,
  type Solution,
} from './puzzle/index.js';

// 🧾 Formatting
export {
  formatError,
  formatAnyError,
  formatLocation,
  highlightSnippet,
  type Location,
  type Position,
  type FormatOptions,
} from './utils/index.js';

import { defaultSettings } from '../config.js';
import { spanLocation, tokenize, tokenLocation, type ArithToken } from '../lexer/index.js';
import type { Location } from '../utils/types.js';
import {
  EmptyExpressionError,
  MalformedExpressionError,
  NestingTooDeepError,
  UnmatchedParenthesisError,
} from './errors.js';
import { Expression, NumberLiteral, type Operand } from './expression.js';
import { Operator } from './operator.js';

export interface BuildOptions {
  /** Deepest allowed parenthesis nesting. */
  maxDepth?: number;
}

type StackEntry =
  | { kind: 'operator'; operator: Operator; token: ArithToken }
  | { kind: 'negate'; token: ArithToken }
  | { kind: 'group'; token: ArithToken };

/**
 * Shunting-yard over the token stream. One instance lives for exactly one
 * build call; use `ExpressionBuilder.build` or `build`.
 */
export class ExpressionBuilder {
  private readonly operands: Operand[] = [];
  private readonly operators: StackEntry[] = [];
  private expectOperand = true;
  private sign: ArithToken | null = null;
  private depth = 0;
  private previous: ArithToken | null = null;

  private constructor(
    private readonly input: string,
    private readonly maxDepth: number
  ) {}

  static build(input: string, options: BuildOptions = {}): Operand {
    const maxDepth = options.maxDepth ?? defaultSettings.maxDepth;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    return new ExpressionBuilder(input, maxDepth).run();
  }

  private run(): Operand {
    for (const token of tokenize(this.input)) {
      switch (token.type) {
        case 'number':
          this.pushNumber(token);
          break;
        case 'op':
          this.pushOperator(token);
          break;
        case 'lparen':
          this.openGroup(token);
          break;
        case 'rparen':
          this.closeGroup(token);
          break;
      }
      this.previous = token;
    }
    return this.finish();
  }

  private pushNumber(token: ArithToken): void {
    if (!this.expectOperand) {
      throw new MalformedExpressionError(`Unexpected number '${token.text}' after an operand`, {
        location: tokenLocation(token),
      });
    }
    const sign = this.sign;
    this.sign = null;
    const text = sign?.text === '-' ? `-${token.text}` : token.text;
    const location = sign ? spanLocation(sign, token) : tokenLocation(token);
    this.operands.push(NumberLiteral.parse(text, location));
    this.expectOperand = false;
  }

  private pushOperator(token: ArithToken): void {
    const location = tokenLocation(token);
    if (this.expectOperand) {
      // A leading + or - is a sign on the next operand, at most one per operand.
      if ((token.text === '+' || token.text === '-') && this.sign === null) {
        this.sign = token;
        return;
      }
      throw new MalformedExpressionError(
        `Unexpected operator '${token.text}' where an operand was expected`,
        { location }
      );
    }

    const operator = Operator.fromSymbol(token.text, { location });
    while (this.shouldReduce(operator)) {
      this.reduce();
    }
    this.operators.push({ kind: 'operator', operator, token });
    this.expectOperand = true;
  }

  private openGroup(token: ArithToken): void {
    const location = tokenLocation(token);
    if (!this.expectOperand) {
      throw new MalformedExpressionError(`Unexpected '(' after an operand`, { location });
    }
    if (this.sign?.text === '-') {
      this.operators.push({ kind: 'negate', token: this.sign });
    }
    this.sign = null;

    this.depth += 1;
    if (this.depth > this.maxDepth) {
      throw new NestingTooDeepError(this.maxDepth, { location });
    }
    this.operators.push({ kind: 'group', token });
  }

  private closeGroup(token: ArithToken): void {
    const location = tokenLocation(token);
    if (this.depth === 0) {
      throw new UnmatchedParenthesisError(')', { location });
    }
    if (this.expectOperand) {
      if (this.previous?.type === 'lparen') {
        throw new EmptyExpressionError('Empty parentheses', {
          location: spanLocation(this.previous, token),
        });
      }
      throw new MalformedExpressionError(`Unexpected ')' where an operand was expected`, { location });
    }

    for (;;) {
      const top = this.operators[this.operators.length - 1];
      if (top === undefined) {
        throw new UnmatchedParenthesisError(')', { location });
      }
      if (top.kind === 'group') {
        this.operators.pop();
        break;
      }
      this.reduce();
    }
    this.depth -= 1;
  }

  private finish(): Operand {
    const last = this.previous;
    if (last === null) {
      throw new EmptyExpressionError();
    }
    if (this.depth > 0) {
      const open = this.innermostGroup();
      throw new UnmatchedParenthesisError('(', {
        location: open ? tokenLocation(open) : undefined,
      });
    }
    if (this.expectOperand) {
      throw new MalformedExpressionError('Unexpected end of input, expected an operand', {
        location: endOf(last),
      });
    }

    while (this.operators.length > 0) {
      this.reduce();
    }

    const [result, ...rest] = this.operands;
    if (result === undefined || rest.length > 0) {
      throw new MalformedExpressionError(
        `Expected a single expression, found ${this.operands.length} operands`
      );
    }
    return result;
  }

  private shouldReduce(incoming: Operator): boolean {
    const top = this.operators[this.operators.length - 1];
    if (top === undefined || top.kind === 'group') return false;
    if (top.kind === 'negate') return true;
    // Equal precedence reduces too: left-associative.
    return top.operator.precedence() >= incoming.precedence();
  }

  private reduce(): void {
    const entry = this.operators.pop();
    if (entry === undefined || entry.kind === 'group') {
      throw new MalformedExpressionError('Operator stack is out of balance');
    }
    const location = tokenLocation(entry.token);

    if (entry.kind === 'negate') {
      const operand = this.popOperand(entry.token);
      this.operands.push(
        new Expression(new NumberLiteral(-1, '-1'), Operator.MULTIPLY, operand, location)
      );
      return;
    }

    const right = this.popOperand(entry.token);
    const left = this.popOperand(entry.token);
    this.operands.push(new Expression(left, entry.operator, right, location));
  }

  private popOperand(token: ArithToken): Operand {
    const operand = this.operands.pop();
    if (operand === undefined) {
      throw new MalformedExpressionError(`Missing operand for '${token.text}'`, {
        location: tokenLocation(token),
      });
    }
    return operand;
  }

  private innermostGroup(): ArithToken | undefined {
    for (let i = this.operators.length - 1; i >= 0; i--) {
      const entry = this.operators[i];
      if (entry.kind === 'group') return entry.token;
    }
    return undefined;
  }
}

function endOf(token: ArithToken): Location {
  const { end } = tokenLocation(token);
  return { start: end, end };
}

export function build(text: string, options: BuildOptions = {}): Operand {
  return ExpressionBuilder.build(text, options);
}

export function evaluate(text: string, options: BuildOptions = {}): number {
  return build(text, options).calculate();
}

import { DivisionByZeroError, InvalidOperandError } from './errors.js';
import { Operator } from './operator.js';
import type { Location } from '../utils/types.js';

const DECIMAL_LITERAL = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

export type OperandNode =
  | { type: 'NumberLiteral'; value: number }
  | { type: 'BinaryExpression'; operator: string; left: OperandNode; right: OperandNode };

export type Operand = NumberLiteral | Expression;

export class NumberLiteral {
  readonly kind = 'literal';

  constructor(
    readonly value: number,
    readonly text: string = String(value),
    readonly location?: Location
  ) {
    Object.freeze(this);
  }

  /** Parses a signed decimal such as `-2.5e3`; surrounding whitespace is ignored. */
  static parse(text: string, location?: Location): NumberLiteral {
    const trimmed = text.trim();
    if (!DECIMAL_LITERAL.test(trimmed)) {
      throw new InvalidOperandError(text, 'is not a decimal number', { location });
    }
    const value = Number(trimmed);
    if (!Number.isFinite(value)) {
      throw new InvalidOperandError(text, 'is out of range', { location });
    }
    return new NumberLiteral(value, trimmed, location);
  }

  static of(value: number): NumberLiteral {
    if (!Number.isFinite(value)) {
      throw new InvalidOperandError(String(value), 'is not a finite number');
    }
    return new NumberLiteral(value);
  }

  calculate(): number {
    return this.value;
  }

  depth(): number {
    return 0;
  }

  equals(other: Operand | number): boolean {
    return sameValue(this, other);
  }

  toString(): string {
    return this.text;
  }

  toJSON(): OperandNode {
    return { type: 'NumberLiteral', value: this.value };
  }
}

/**
 * One binary operation. Operands are literals or nested expressions owned by
 * this node; nodes are frozen once constructed.
 */
export class Expression {
  readonly kind = 'expression';

  constructor(
    readonly left: Operand,
    readonly operator: Operator,
    readonly right: Operand,
    readonly location?: Location
  ) {
    Object.freeze(this);
  }

  /**
   * Builds a node from parts that are already grouped. String operands must be
   * decimal literals and a string operator must be one of `+ - * /`.
   */
  static parse(
    left: string | number | Operand,
    operator: string | Operator,
    right: string | number | Operand
  ): Expression {
    return new Expression(
      toOperand(left),
      operator instanceof Operator ? operator : Operator.fromSymbol(operator),
      toOperand(right)
    );
  }

  calculate(): number {
    return foldOperand(
      this,
      (literal) => literal.value,
      (node, left, right) => {
        if (node.operator === Operator.DIVIDE && right === 0) {
          throw new DivisionByZeroError(left, { location: node.location });
        }
        return node.operator.apply(left, right);
      }
    );
  }

  depth(): number {
    return foldOperand(
      this,
      () => 0,
      (_node, left, right) => 1 + Math.max(left, right)
    );
  }

  equals(other: Operand | number): boolean {
    return sameValue(this, other);
  }

  /** Canonical form with only the parentheses precedence requires. */
  toString(): string {
    return foldOperand<Rendered>(
      this,
      (literal) => ({ text: literal.text, precedence: Infinity }),
      (node, left, right) => {
        const precedence = node.operator.precedence();
        const l = left.precedence < precedence ? `(${left.text})` : left.text;
        const r = right.precedence <= precedence ? `(${right.text})` : right.text;
        return { text: `${l} ${node.operator.symbol} ${r}`, precedence };
      }
    ).text;
  }

  toJSON(): OperandNode {
    return foldOperand<OperandNode>(
      this,
      (literal) => literal.toJSON(),
      (node, left, right) => ({
        type: 'BinaryExpression',
        operator: node.operator.symbol,
        left,
        right,
      })
    );
  }
}

interface Rendered {
  text: string;
  precedence: number;
}

/**
 * Post-order walk on an explicit stack. A chain without parentheses adds one
 * tree level per operator, so recursion depth is not bounded by `maxDepth`.
 */
function foldOperand<T>(
  root: Operand,
  leaf: (literal: NumberLiteral) => T,
  branch: (node: Expression, left: T, right: T) => T
): T {
  const results: T[] = [];
  const pending: Array<{ node: Operand; expanded: boolean }> = [{ node: root, expanded: false }];

  for (let frame = pending.pop(); frame !== undefined; frame = pending.pop()) {
    const { node } = frame;
    if (node.kind === 'literal') {
      results.push(leaf(node));
    } else if (!frame.expanded) {
      pending.push(
        { node, expanded: true },
        { node: node.right, expanded: false },
        { node: node.left, expanded: false }
      );
    } else {
      const [left, right] = results.splice(-2, 2);
      results.push(branch(node, left, right));
    }
  }
  return results[0];
}

function toOperand(value: string | number | Operand): Operand {
  if (typeof value === 'string') return NumberLiteral.parse(value);
  if (typeof value === 'number') return NumberLiteral.of(value);
  return value;
}

function sameValue(self: Operand, other: Operand | number): boolean {
  const otherValue = typeof other === 'number' ? other : other.calculate();
  return self.calculate() === otherValue;
}

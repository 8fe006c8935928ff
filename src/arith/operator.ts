import { DivisionByZeroError, UnknownOperatorError, type ErrorDetails } from './errors.js';

export type OperatorSymbol = '+' | '-' | '*' | '/';
export type OperatorName = 'add' | 'subtract' | 'multiply' | 'divide';

type Precedence = 1 | 2;

/**
 * The closed set of binary operators. Instances exist only as the four
 * static members below; the constructor is private so the set cannot grow
 * at run time.
 */
export class Operator {
  static readonly ADD = new Operator('add', '+', 1);
  static readonly SUBTRACT = new Operator('subtract', '-', 1);
  static readonly MULTIPLY = new Operator('multiply', '*', 2);
  static readonly DIVIDE = new Operator('divide', '/', 2);

  static readonly all: readonly Operator[] = [
    Operator.ADD,
    Operator.SUBTRACT,
    Operator.MULTIPLY,
    Operator.DIVIDE,
  ];

  private constructor(
    readonly name: OperatorName,
    readonly symbol: OperatorSymbol,
    private readonly rank: Precedence
  ) {
    Object.freeze(this);
  }

  static isSymbol(value: string): value is OperatorSymbol {
    return value === '+' || value === '-' || value === '*' || value === '/';
  }

  static fromSymbol(symbol: string, details: ErrorDetails = {}): Operator {
    switch (symbol) {
      case '+':
        return Operator.ADD;
      case '-':
        return Operator.SUBTRACT;
      case '*':
        return Operator.MULTIPLY;
      case '/':
        return Operator.DIVIDE;
      default:
        throw new UnknownOperatorError(symbol, details);
    }
  }

  /** Higher binds tighter. */
  precedence(): number {
    return this.rank;
  }

  apply(a: number, b: number): number {
    switch (this.name) {
      case 'add':
        return a + b;
      case 'subtract':
        return a - b;
      case 'multiply':
        return a * b;
      case 'divide':
        if (b === 0) {
          throw new DivisionByZeroError(a);
        }
        return a / b;
      default: {
        const unreachable: never = this.name;
        throw new UnknownOperatorError(String(unreachable));
      }
    }
  }

  toString(): string {
    return this.symbol;
  }
}

import { Operator } from '../src/arith/operator';
import { DivisionByZeroError, UnknownOperatorError } from '../src/arith/errors';
import { catchError } from './helpers';

describe('Operator', () => {
  it('resolves every supported symbol', () => {
    expect(Operator.fromSymbol('+')).toBe(Operator.ADD);
    expect(Operator.fromSymbol('-')).toBe(Operator.SUBTRACT);
    expect(Operator.fromSymbol('*')).toBe(Operator.MULTIPLY);
    expect(Operator.fromSymbol('/')).toBe(Operator.DIVIDE);
  });

  it('rejects symbols outside the closed set', () => {
    expect(() => Operator.fromSymbol('^')).toThrow(UnknownOperatorError);
    expect(() => Operator.fromSymbol('**')).toThrow(UnknownOperatorError);
    const err = catchError(() => Operator.fromSymbol('%'));
    expect(err).toBeInstanceOf(UnknownOperatorError);
    expect(err).toMatchObject({ symbol: '%', code: 'UNKNOWN_OPERATOR' });
  });

  it('ranks multiplication and division above addition and subtraction', () => {
    expect(Operator.MULTIPLY.precedence()).toBe(2);
    expect(Operator.DIVIDE.precedence()).toBe(2);
    expect(Operator.ADD.precedence()).toBe(1);
    expect(Operator.SUBTRACT.precedence()).toBe(1);
  });

  it('applies the binary function of each variant', () => {
    expect(Operator.ADD.apply(2, 3)).toBe(5);
    expect(Operator.SUBTRACT.apply(2, 3)).toBe(-1);
    expect(Operator.MULTIPLY.apply(2, 3)).toBe(6);
    expect(Operator.DIVIDE.apply(3, 2)).toBe(1.5);
  });

  it('refuses to divide by zero, signed or not', () => {
    expect(() => Operator.DIVIDE.apply(1, 0)).toThrow(DivisionByZeroError);
    expect(() => Operator.DIVIDE.apply(1, -0)).toThrow(DivisionByZeroError);
    expect(Operator.DIVIDE.apply(0, 5)).toBe(0);
  });

  it('exposes a frozen, ordered set of four variants', () => {
    expect(Operator.all.map((op) => op.symbol)).toEqual(['+', '-', '*', '/']);
    expect(Operator.all.map((op) => op.name)).toEqual(['add', 'subtract', 'multiply', 'divide']);
    expect(Object.isFrozen(Operator.ADD)).toBe(true);
  });

  it('guards and prints symbols', () => {
    expect(Operator.isSymbol('*')).toBe(true);
    expect(Operator.isSymbol('x')).toBe(false);
    expect(String(Operator.DIVIDE)).toBe('/');
  });
});

import { evaluate } from '../arith/builder.js';
import { DivisionByZeroError } from '../arith/errors.js';
import { Operator } from '../arith/operator.js';

export interface GenerateOptions {
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number;
  groupProbability?: number;
  closeProbability?: number;
}

export interface SolveOptions extends GenerateOptions {
  attempts?: number;
  tolerance?: number;
  onAttempt?: (attempt: SolveAttempt) => void;
}

export type SolveAttempt =
  | { attempt: number; text: string; value: number }
  | { attempt: number; text: string; error: DivisionByZeroError };

export interface Solution {
  text: string;
  value: number;
  attempts: number;
}

/**
 * Random expression using every number once, in order, joined by random
 * operators and optionally grouped with parentheses.
 */
export function generateExpression(numbers: readonly number[], options: GenerateOptions = {}): string {
  if (numbers.length === 0) {
    throw new RangeError('generateExpression needs at least one number');
  }
  const random = options.random ?? Math.random;
  const groupProbability = options.groupProbability ?? 0.3;
  const closeProbability = options.closeProbability ?? 0.5;

  const parts: string[] = [];
  let open = 0;

  numbers.forEach((n, i) => {
    const opensGroup = random() < groupProbability;
    if (opensGroup) {
      parts.push('(');
      open += 1;
    }
    parts.push(String(n));
    // never close on the number that opened the group: "(5)" is pointless
    if (open > 0 && !opensGroup && random() < closeProbability) {
      parts.push(')');
      open -= 1;
    }
    if (i + 1 < numbers.length) {
      parts.push(pick(Operator.all, random).symbol);
    }
  });

  parts.push(')'.repeat(open));
  return parts.join('');
}

export function findExpression(
  numbers: readonly number[],
  goal: number,
  options: SolveOptions = {}
): Solution | null {
  const attempts = options.attempts ?? 1000;
  const tolerance = options.tolerance ?? 1e-9;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const text = generateExpression(numbers, options);
    let value: number;
    try {
      value = evaluate(text);
    } catch (err) {
      if (err instanceof DivisionByZeroError) {
        options.onAttempt?.({ attempt, text, error: err });
        continue;
      }
      throw err;
    }
    options.onAttempt?.({ attempt, text, value });
    if (Math.abs(value - goal) <= tolerance) {
      return { text, value, attempts: attempt };
    }
  }
  return null;
}

function pick<T>(items: readonly T[], random: () => number): T {
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

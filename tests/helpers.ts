export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

/** Deterministic stand-in for Math.random that cycles through `values`. */
export function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

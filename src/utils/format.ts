import { createColors } from 'colorette';
import { isArithmeticError, type ArithmeticError } from '../arith/errors.js';
import { highlightSnippet } from './highlight.js';
import type { FormatOptions, Location } from './types.js';

export function formatLocation(location: Location): string {
  const { start, end } = location;
  if (start.line !== end.line) {
    return `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column - 1}`;
  }
  const lastColumn = end.column - 1;
  return lastColumn <= start.column
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column}-${lastColumn}`;
}

export function formatError(error: ArithmeticError, options: FormatOptions = {}): string {
  const useColors = options.useColors ?? true;
  const colors = createColors({ useColor: useColors });
  const parts: string[] = [`${colors.red(`❌ ${error.name}:`)} ${error.message}`];

  if (error.location) {
    parts.push(`${colors.blue('↪ at')} ${formatLocation(error.location)}`);
    if (options.input !== undefined) {
      const snippet = highlightSnippet(options.input, error.location, useColors);
      if (snippet) parts.push(snippet);
    }
  }

  return parts.join('\n');
}

export function formatAnyError(err: unknown, options: FormatOptions = {}): string {
  if (isArithmeticError(err)) {
    return formatError(err, options);
  }
  const colors = createColors({ useColor: options.useColors ?? true });
  if (err instanceof Error) {
    return `${colors.red(`❌ ${err.name}:`)} ${err.message}`;
  }
  return `${colors.red('❌ Error:')} ${typeof err === 'string' ? err : 'Unknown error'}`;
}

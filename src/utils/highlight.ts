import type { Location } from './types.js';
import chalk from 'chalk';

/**
 * Render the line holding `location` with its neighbours and a caret run
 * under the highlighted span.
 */
export function highlightSnippet(input: string, location: Location, useColor = true): string {
  const lines = input.split('\n');
  const lineNum = location.start.line;
  const colNum = location.start.column;

  if (lineNum < 1 || lineNum > lines.length) return '';

  const targetLine = lines[lineNum - 1];
  const width = String(Math.min(lines.length, lineNum + 1)).length;
  const prefix = (n: number) => `${String(n).padStart(width)} | `;

  const span =
    location.end.line === lineNum ? Math.max(1, location.end.column - colNum) : 1;
  const pointerLine = ' '.repeat(prefix(lineNum).length + colNum - 1) + '^'.repeat(span);

  const resultLines: string[] = [];
  if (lineNum > 1) resultLines.push(prefix(lineNum - 1) + lines[lineNum - 2]);
  resultLines.push(prefix(lineNum) + (useColor ? chalk.redBright(targetLine) : targetLine));
  resultLines.push(useColor ? chalk.yellow(pointerLine) : pointerLine);
  if (lineNum < lines.length) resultLines.push(prefix(lineNum + 1) + lines[lineNum]);

  return resultLines.join('\n');
}

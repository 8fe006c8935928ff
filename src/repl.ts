import readline, { type Interface } from 'node:readline';

import { build } from './arith/builder.js';
import { defaultSettings, resolveSettings, type EvaluatorSettings } from './config.js';
import { formatAnyError } from './utils/format.js';
import { createLogger } from './utils/log.js';

export interface ReplReply {
  text: string;
  isError: boolean;
  exit: boolean;
}

export const REPL_HELP = [
  'Commands:',
  '  <expression>   Evaluate, e.g. 3 + 4 * (2 - 1)',
  '  .ast <expr>    Print the expression tree as JSON',
  '  .help          Show this help',
  '  .exit          Leave the REPL',
].join('\n');

/** Pure handler for one REPL line; null means there is nothing to print. */
export function handleReplLine(
  line: string,
  settings: EvaluatorSettings = defaultSettings
): ReplReply | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  if (trimmed === '.exit') {
    return { text: 'Goodbye!', isError: false, exit: true };
  }
  if (trimmed === '.help') {
    return { text: REPL_HELP, isError: false, exit: false };
  }
  if (trimmed === '.ast') {
    return { text: 'Usage: .ast <expression>', isError: true, exit: false };
  }

  const showAst = trimmed.startsWith('.ast ');
  // ".5" is a number, ".foo" is a command
  if (!showAst && /^\.[a-z]/i.test(trimmed)) {
    return { text: `Unknown command '${trimmed}'. Use .help`, isError: true, exit: false };
  }

  const input = showAst ? trimmed.slice(5) : trimmed;
  try {
    const tree = build(input, { maxDepth: settings.maxDepth });
    const text = showAst
      ? JSON.stringify(tree, null, 2)
      : `${tree.toString()} = ${tree.calculate()}`;
    return { text, isError: false, exit: false };
  } catch (err) {
    return {
      text: formatAnyError(err, { input, useColors: settings.useColors }),
      isError: true,
      exit: false,
    };
  }
}

export function runREPL(settings: EvaluatorSettings = resolveSettings()): Interface {
  const log = createLogger({ useColors: settings.useColors });
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'arith> ',
  });

  log.info('safe-arith REPL');
  console.log(REPL_HELP + '\n');
  rl.prompt();

  rl.on('line', (line: string) => {
    const reply = handleReplLine(line, settings);
    if (reply) {
      if (reply.isError) {
        console.error(reply.text);
      } else {
        console.log(reply.text);
      }
      if (reply.exit) {
        rl.close();
        return;
      }
    }
    rl.prompt();
  });

  return rl;
}

if (require.main === module) {
  runREPL();
}

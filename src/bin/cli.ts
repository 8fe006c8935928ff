#!/usr/bin/env node
import { argv } from 'node:process';
import { createColors } from 'colorette';

import { build } from '../arith/builder.js';
import { parsePositiveInteger, resolveSettings, type EvaluatorSettings } from '../config.js';
import { findExpression } from '../puzzle/index.js';
import { runREPL } from '../repl.js';
import { formatAnyError } from '../utils/format.js';
import { createLogger, type Logger } from '../utils/log.js';

export interface CLIConfig {
  expression?: string;
  ast: boolean;
  verbose: boolean;
  interactive: boolean;
  help: boolean;
  noColor: boolean;
  maxDepth?: number;
  solve?: number;
  numbers: number[];
  attempts: number;
}

const DEFAULT_NUMBERS = [5, 5, 5, 5, 5];

function printHelp(useColors: boolean) {
  const colors = createColors({ useColor: useColors });
  console.log(`
${colors.bold('safe-arith')} - evaluate arithmetic without eval

${colors.bold('USAGE:')}
  safe-arith <expression> [options]
  safe-arith --solve <goal> [--numbers 5,5,5,5,5] [--attempts n]

${colors.bold('OPTIONS:')}
  ${colors.green('--ast')}                   Print the expression tree as JSON
  ${colors.green('--max-depth <n>')}         Deepest allowed parenthesis nesting
  ${colors.green('--solve <goal>')}          Search random expressions over --numbers for goal
  ${colors.green('--numbers <list>')}        Comma separated numbers for --solve
  ${colors.green('--attempts <n>')}          Attempts for --solve (default: 1000)
  ${colors.green('--interactive, -i')}       Start the REPL
  ${colors.green('--verbose, -v')}           Enable verbose output
  ${colors.green('--no-color')}              Disable colored output
  ${colors.green('--help, -h')}              Show this help

${colors.bold('EXAMPLES:')}
  safe-arith "3 + 4 * (2 - 1)"
  safe-arith "(5 - 4) / 5" --ast
  safe-arith --solve 9 --numbers 5,5,5,5,5
`);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`Invalid value for ${flag}: '${raw}'`);
  }
  return value;
}

export function parseArgs(args: string[]): CLIConfig {
  const config: CLIConfig = {
    ast: false,
    verbose: false,
    interactive: false,
    help: false,
    noColor: false,
    numbers: DEFAULT_NUMBERS,
    attempts: 1000,
  };
  const positional: string[] = [];
  let optionsEnded = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (optionsEnded) {
      positional.push(arg);
      continue;
    }

    switch (arg) {
      case '--':
        optionsEnded = true;
        break;
      case '--ast':
        config.ast = true;
        break;
      case '--max-depth':
        config.maxDepth = parsePositiveInteger(requireValue(arg, args[++i]), '--max-depth');
        break;
      case '--solve':
        config.solve = parseNumber(arg, requireValue(arg, args[++i]));
        break;
      case '--numbers':
        config.numbers = requireValue(arg, args[++i])
          .split(',')
          .map((part) => parseNumber(arg, part));
        break;
      case '--attempts':
        config.attempts = parsePositiveInteger(requireValue(arg, args[++i]), '--attempts');
        break;
      case '--interactive':
      case '-i':
        config.interactive = true;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--no-color':
        config.noColor = true;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        // "-3 + 4" is an expression, "--foo" is not
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length > 0) {
    config.expression = positional.join(' ');
  }
  return config;
}

function runSolve(config: CLIConfig, goal: number, log: Logger): number {
  log.info(`Searching for ${goal} using ${config.numbers.join(', ')}`);
  const solution = findExpression(config.numbers, goal, {
    attempts: config.attempts,
    onAttempt: (attempt) => {
      const outcome = 'error' in attempt ? attempt.error.message : String(attempt.value);
      log.debug(`#${attempt.attempt} ${attempt.text} = ${outcome}`);
    },
  });

  if (!solution) {
    log.warn(`No expression found after ${config.attempts} attempts`);
    return 1;
  }
  console.log(`${solution.text} = ${solution.value}`);
  log.success(`Found after ${solution.attempts} attempt${solution.attempts === 1 ? '' : 's'}`);
  return 0;
}

function runExpression(expression: string, config: CLIConfig, settings: EvaluatorSettings, log: Logger): number {
  try {
    const tree = build(expression, { maxDepth: settings.maxDepth });
    log.debug(`Parsed as ${tree.toString()} (depth ${tree.depth()})`);
    console.log(config.ast ? JSON.stringify(tree, null, 2) : String(tree.calculate()));
    return 0;
  } catch (err) {
    console.error(formatAnyError(err, { input: expression, useColors: settings.useColors }));
    return 1;
  }
}

/** Returns the exit code, or null while the REPL keeps the process alive. */
export function main(args: string[]): number | null {
  let config: CLIConfig;
  let settings: EvaluatorSettings;
  try {
    config = parseArgs(args);
    const overrides: Partial<EvaluatorSettings> = {};
    if (config.maxDepth !== undefined) overrides.maxDepth = config.maxDepth;
    if (config.noColor) overrides.useColors = false;
    settings = resolveSettings(process.env, overrides);
  } catch (err) {
    createLogger().error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const log = createLogger({ useColors: settings.useColors, verbose: config.verbose });
  log.debug(`Max nesting depth: ${settings.maxDepth}`);

  if (config.help) {
    printHelp(settings.useColors);
    return 0;
  }
  if (config.interactive) {
    runREPL(settings);
    return null;
  }
  if (config.solve !== undefined) {
    return runSolve(config, config.solve, log);
  }
  if (config.expression === undefined) {
    printHelp(settings.useColors);
    return 1;
  }
  return runExpression(config.expression, config, settings, log);
}

if (require.main === module) {
  const code = main(argv.slice(2));
  if (code !== null) {
    process.exitCode = code;
  }
}

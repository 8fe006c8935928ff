import { createColors } from 'colorette';

export interface LoggerOptions {
  useColors?: boolean;
  verbose?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const colors = createColors({ useColor: options.useColors ?? true });
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  return {
    info: (msg) => out(`${colors.blue('ℹ')} ${msg}`),
    success: (msg) => out(`${colors.green('✔')} ${msg}`),
    warn: (msg) => err(`${colors.yellow('⚠')} ${msg}`),
    error: (msg) => err(`${colors.red('✖')} ${msg}`),
    debug: (msg) => {
      if (options.verbose) out(colors.dim(`› ${msg}`));
    },
  };
}

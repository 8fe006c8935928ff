import { main, parseArgs } from '../src/bin/cli';

describe('parseArgs', () => {
  it('joins positional words into one expression', () => {
    expect(parseArgs(['2', '+', '3']).expression).toBe('2 + 3');
  });

  it('treats a leading minus as part of the expression', () => {
    const config = parseArgs(['-3+4', '--ast']);
    expect(config.expression).toBe('-3+4');
    expect(config.ast).toBe(true);
  });

  it('reads solver options', () => {
    const config = parseArgs(['--solve', '9', '--numbers', '5,5,5', '--attempts', '10']);
    expect(config).toMatchObject({ solve: 9, numbers: [5, 5, 5], attempts: 10 });
  });

  it('rejects bad options', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['--max-depth', '0'])).toThrow(/positive integer/);
    expect(() => parseArgs(['--max-depth'])).toThrow('Missing value for --max-depth');
    expect(() => parseArgs(['--numbers', '5,x'])).toThrow("Invalid value for --numbers: 'x'");
  });
});

describe('main', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints the value of an expression', () => {
    expect(main(['2 + 3 * 4', '--no-color'])).toBe(0);
    expect(log).toHaveBeenCalledWith('14');
  });

  it('prints the tree as JSON', () => {
    expect(main(['--ast', '1 + 2', '--no-color'])).toBe(0);
    expect(log).toHaveBeenCalledWith(
      JSON.stringify(
        {
          type: 'BinaryExpression',
          operator: '+',
          left: { type: 'NumberLiteral', value: 1 },
          right: { type: 'NumberLiteral', value: 2 },
        },
        null,
        2
      )
    );
  });

  it('reports errors on stderr with exit code 1', () => {
    expect(main(['5 / 0', '--no-color'])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      [
        '❌ DivisionByZeroError: Division by zero (5 / 0)',
        '↪ at Line 1, Col 3',
        '1 | 5 / 0',
        '      ^',
      ].join('\n')
    );
  });

  it('honours --max-depth', () => {
    expect(main(['((1))', '--max-depth', '1', '--no-color'])).toBe(1);
    expect(error.mock.calls[0][0]).toMatch(/^❌ NestingTooDeepError:/);
  });

  it('solves the number puzzle', () => {
    jest.spyOn(Math, 'random').mockReturnValue(0.8);
    expect(main(['--solve', '1', '--numbers', '5,5', '--no-color'])).toBe(0);
    expect(log).toHaveBeenCalledWith('5/5 = 1');
  });

  it('prints help without an expression', () => {
    expect(main(['--no-color'])).toBe(1);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toContain('safe-arith <expression> [options]');
  });
});

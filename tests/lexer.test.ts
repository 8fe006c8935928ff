import { spanLocation, tokenize, tokenLocation } from '../src/lexer/index';
import { LexError } from '../src/arith/errors';
import { catchError } from './helpers';

describe('tokenize', () => {
  it('yields numbers, operators and parentheses, skipping whitespace', () => {
    const tokens = [...tokenize(' 12 + (3.5)*.5e-1 ')];
    expect(tokens.map((t) => [t.type, t.text])).toEqual([
      ['number', '12'],
      ['op', '+'],
      ['lparen', '('],
      ['number', '3.5'],
      ['rparen', ')'],
      ['op', '*'],
      ['number', '.5e-1'],
    ]);
  });

  it('tracks offsets, lines and columns', () => {
    const [one, plus, two] = [...tokenize('1 +\n  2')];
    expect(one).toMatchObject({ offset: 0, line: 1, col: 1 });
    expect(plus).toMatchObject({ offset: 2, line: 1, col: 3 });
    expect(two).toMatchObject({ offset: 6, line: 2, col: 3 });
  });

  it('does not fold signs into numbers', () => {
    expect([...tokenize('-3')].map((t) => t.type)).toEqual(['op', 'number']);
  });

  it('reports the first unknown character with its location', () => {
    const err = catchError(() => [...tokenize('1 $ 2')]);
    expect(err).toBeInstanceOf(LexError);
    expect(err).toMatchObject({
      code: 'LEX_ERROR',
      found: '$',
      location: {
        start: { line: 1, column: 3, offset: 2 },
        end: { line: 1, column: 4, offset: 3 },
      },
    });
  });

  it('is lazy', () => {
    const tokens = tokenize('1 + #');
    expect(tokens.next().value).toMatchObject({ type: 'number', text: '1' });
    expect(tokens.next().value).toMatchObject({ type: 'op', text: '+' });
    expect(() => tokens.next()).toThrow(LexError);
  });

  it('keeps concurrent streams independent', () => {
    const a = tokenize('1+2');
    const b = tokenize('3*4');
    expect(a.next().value).toMatchObject({ text: '1' });
    expect(b.next().value).toMatchObject({ text: '3' });
    expect(a.next().value).toMatchObject({ text: '+' });
    expect(b.next().value).toMatchObject({ text: '*' });
  });
});

describe('token locations', () => {
  it('spans one or several tokens', () => {
    const [minus, three] = [...tokenize('- 35')];
    expect(tokenLocation(three)).toEqual({
      start: { line: 1, column: 3, offset: 2 },
      end: { line: 1, column: 5, offset: 4 },
    });
    expect(spanLocation(minus, three)).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 5, offset: 4 },
    });
  });
});

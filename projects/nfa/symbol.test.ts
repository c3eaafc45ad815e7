import { UnacceptedSymbolError } from './errors.js';
import { ALPHABET, InputSymbol, parseSymbol, symbolOf } from './symbol.js';

describe('symbolOf', () => {
  const cases: [string, InputSymbol][] = [
    ['0', InputSymbol.ZERO],
    ['1', InputSymbol.ONE],
    ['2', InputSymbol.TWO],
    ['3', InputSymbol.THREE],
  ];
  test.each(cases)('%s', (character, expected) => {
    expect(symbolOf(character)).toBe(expected);
  });

  test.each(['4', '9', 'x', ' ', '#', '', '01', 'δ'])(
    'rejects %p',
    (character) => {
      expect(() => symbolOf(character)).toThrow(UnacceptedSymbolError);
    }
  );

  test('the error carries the offending character', () => {
    let error: unknown;
    try {
      symbolOf('x');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(UnacceptedSymbolError);
    if (error instanceof UnacceptedSymbolError) {
      expect(error.character).toBe('x');
      expect(error.message).toBe("Automaton doesn't accept symbol: x");
    }
  });
});

describe('parseSymbol', () => {
  test('ok for symbols of the alphabet', () => {
    for (const symbol of ALPHABET) {
      expect(parseSymbol(symbol)._unsafeUnwrap()).toBe(symbol);
    }
  });

  test('err for anything else', () => {
    const result = parseSymbol('a');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().character).toBe('a');
  });
});

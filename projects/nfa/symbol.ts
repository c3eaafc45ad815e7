import { err, ok, Result } from 'neverthrow';
import { UnacceptedSymbolError } from './errors.js';

export enum InputSymbol {
  ZERO = '0',
  ONE = '1',
  TWO = '2',
  THREE = '3',
}

/**
 * The input alphabet, in transition table column order.
 */
export const ALPHABET: readonly InputSymbol[] = [
  InputSymbol.ZERO,
  InputSymbol.ONE,
  InputSymbol.TWO,
  InputSymbol.THREE,
];

export function isInputSymbol(value: string): value is InputSymbol {
  return ALPHABET.some((symbol) => symbol === value);
}

export function parseSymbol(
  character: string
): Result<InputSymbol, UnacceptedSymbolError> {
  if (isInputSymbol(character)) {
    return ok(character);
  }
  return err(new UnacceptedSymbolError(character));
}

/**
 * Get the symbol for a single input character.
 *
 * @throws UnacceptedSymbolError if the character is not in the alphabet
 */
export function symbolOf(character: string): InputSymbol {
  const result = parseSymbol(character);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Thrown (or returned) when a character is not part of the automaton's
 * input alphabet.
 */
export class UnacceptedSymbolError extends Error {
  readonly character: string;
  constructor(character: string) {
    super(`Automaton doesn't accept symbol: ${character}`);
    this.name = 'UnacceptedSymbolError';
    this.character = character;
  }
}

export class TableFormatError extends Error {
  readonly path: string;
  constructor(path: string, message: string) {
    super(`TableFormatError at ${path || '<root>'}: ${message}`);
    this.name = 'TableFormatError';
    this.path = path;
  }
}

export class AutomatonClosedError extends Error {
  constructor(operation: string) {
    super(`AutomatonClosedError: cannot ${operation} a closed automaton`);
    this.name = 'AutomatonClosedError';
  }
}

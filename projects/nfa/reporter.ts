import { colors } from '../utils/debug.js';
import { formatPath, formatState, formatStates } from './format.js';
import type { InputSymbol } from './symbol.js';
import type { StateId } from './transition-table.js';

/**
 * Receives everything an automaton reports while it runs.
 */
export interface AutomatonReporter {
  symbol(symbol: InputSymbol): void;
  currentStates(states: readonly StateId[]): void;
  tripletOccurrences(occurrences: ReadonlyMap<InputSymbol, number>): void;
  finalState(state: StateId, accepting: boolean): void;
  statePath(path: readonly StateId[]): void;
}

export interface DriverReporter extends AutomatonReporter {
  token(token: string): void;
  error(error: Error): void;
  message(text: string): void;
}

export class NullReporter implements DriverReporter {
  symbol() {}
  currentStates() {}
  tripletOccurrences() {}
  finalState() {}
  statePath() {}
  token() {}
  error() {}
  message() {}
}

/**
 * Writes one line of text per report.
 */
export class TextReporter implements DriverReporter {
  private readonly write: (line: string) => void;

  constructor(write: (line: string) => void = (line) => console.log(line)) {
    this.write = write;
  }

  token(token: string) {
    this.write('');
    this.write(`Reading token: ${colors.bold(token)}`);
  }

  symbol(symbol: InputSymbol) {
    this.write(`Reading symbol: ${symbol}`);
  }

  currentStates(states: readonly StateId[]) {
    this.write(`Current automaton states: ${formatStates(states)}`);
  }

  tripletOccurrences(occurrences: ReadonlyMap<InputSymbol, number>) {
    for (const [symbol, count] of occurrences) {
      this.write(`Symbol ${symbol} was tripled ${count} times already`);
    }
  }

  finalState(state: StateId, accepting: boolean) {
    const label = accepting
      ? colors.green('accepting')
      : colors.red('rejecting');
    this.write(`Final automaton state: ${formatState(state)} (${label})`);
  }

  statePath(path: readonly StateId[]) {
    this.write(`State change path: ${formatPath(path)}`);
  }

  error(error: Error) {
    this.write(colors.red(error.message));
  }

  message(text: string) {
    this.write(text);
  }
}

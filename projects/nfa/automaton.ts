import { log, logger } from '../utils/debug.js';
import { AutomatonClosedError } from './errors.js';
import { formatPath } from './format.js';
import { type AutomatonReporter, NullReporter } from './reporter.js';
import type { InputSymbol } from './symbol.js';
import type { StateId, TransitionTable } from './transition-table.js';

/**
 * The states visited by one run of the automaton, starting at the start state.
 */
export type Path = readonly StateId[];

export type Verdict = {
  finalState: StateId;
  accepting: boolean;
  path: Path;
};

export type AutomatonRun<R> = {
  result: R;
  verdict: Verdict;
};

const lastState = (path: Path): StateId => path[path.length - 1];
const pathSum = (path: Path): number => path.reduce((a, b) => a + b, 0);

/**
 * Simulates a non-deterministic finite automaton by following every
 * possible path through the transition table at once.
 *
 * Once a symbol kills every live path the automaton is put on hold, and
 * nothing it reads afterwards has any effect.
 */
export class Automaton {
  private readonly table: TransitionTable;
  private readonly reporter: AutomatonReporter;

  private _paths: Path[];
  private onHold = false;
  private closed = false;

  // consecutive occurrences of the most recently consumed symbol
  private readonly streakCounts: Map<InputSymbol, number> = new Map();
  // how many times a symbol was read for the third (or later) time in a row
  private readonly tripletCounts: Map<InputSymbol, number> = new Map();

  constructor(
    table: TransitionTable,
    reporter: AutomatonReporter = new NullReporter()
  ) {
    this.table = table;
    this.reporter = reporter;
    this._paths = [[table.getStartState()]];
    this.reporter.currentStates(this.currentStates());
  }

  get paths(): readonly Path[] {
    return this._paths;
  }

  get isOnHold() {
    return this.onHold;
  }

  get isClosed() {
    return this.closed;
  }

  get streaks(): ReadonlyMap<InputSymbol, number> {
    return new Map(this.streakCounts);
  }

  get tripletOccurrences(): ReadonlyMap<InputSymbol, number> {
    return new Map(this.tripletCounts);
  }

  /**
   * The distinct last states of all live paths, in ascending order.
   */
  currentStates(): StateId[] {
    return [...new Set(this._paths.map(lastState))].sort((a, b) => a - b);
  }

  isAccepting(): boolean {
    return this._paths.some((path) =>
      this.table.isAcceptingState(lastState(path))
    );
  }

  /**
   * Read one symbol and advance every live path.
   *
   * @returns whether the automaton is in an accepting configuration
   * after a successful transition
   */
  consume(symbol: InputSymbol): boolean {
    if (this.closed) {
      throw new AutomatonClosedError('consume');
    }
    this.reporter.symbol(symbol);
    if (this.onHold) {
      return false;
    }

    const nextPaths = this._paths.flatMap((path) =>
      [...this.table.getNextStates(lastState(path), symbol)].map((state) => [
        ...path,
        state,
      ])
    );

    if (nextPaths.length == 0) {
      log(`automaton on hold after reading ${symbol}`);
      this.onHold = true;
      this.reporter.currentStates(this.currentStates());
      return false;
    }

    this._paths = nextPaths;
    this.incrementOccurrence(symbol);
    if (logger.enabled) {
      log(`read ${symbol}:`, this._paths.map(formatPath).join(' | '));
    }

    const accepting = this.isAccepting();
    if (accepting) {
      this.reporter.tripletOccurrences(this.tripletOccurrences);
    }
    this.reporter.currentStates(this.currentStates());
    return accepting;
  }

  private incrementOccurrence(symbol: InputSymbol) {
    for (const other of [...this.streakCounts.keys()]) {
      if (other !== symbol) {
        this.streakCounts.delete(other);
      }
    }
    const streak = (this.streakCounts.get(symbol) ?? 0) + 1;
    this.streakCounts.set(symbol, streak);
    if (streak >= 3) {
      this.tripletCounts.set(symbol, (this.tripletCounts.get(symbol) ?? 0) + 1);
    }
  }

  /**
   * The outcome of the run so far. The reported path is the one ending in
   * the highest state; among those, the one with the greatest sum of
   * visited states wins.
   */
  verdict(): Verdict {
    let best = this._paths[0];
    for (const path of this._paths) {
      const last = lastState(path);
      const bestLast = lastState(best);
      if (last > bestLast || (last == bestLast && pathSum(path) > pathSum(best))) {
        best = path;
      }
    }
    const finalState = lastState(best);
    return {
      finalState,
      accepting: this.table.isAcceptingState(finalState),
      path: best,
    };
  }

  /**
   * Report the final state and the path that led to it.
   * Can only be called once.
   */
  close(): Verdict {
    if (this.closed) {
      throw new AutomatonClosedError('close');
    }
    this.closed = true;
    const verdict = this.verdict();
    this.reporter.finalState(verdict.finalState, verdict.accepting);
    this.reporter.statePath(verdict.path);
    return verdict;
  }
}

/**
 * Run `body` with a fresh automaton, closing the automaton exactly once
 * however `body` exits.
 */
export function withAutomaton<R>(
  table: TransitionTable,
  reporter: AutomatonReporter,
  body: (automaton: Automaton) => R
): AutomatonRun<R> {
  const automaton = new Automaton(table, reporter);
  try {
    const result = body(automaton);
    return { result, verdict: automaton.close() };
  } catch (e) {
    if (automaton.isClosed) {
      throw e;
    }
    try {
      automaton.close();
    } catch (closeError) {
      throw new AggregateError(
        [e, closeError],
        'automaton failed and could not be closed'
      );
    }
    throw e;
  }
}

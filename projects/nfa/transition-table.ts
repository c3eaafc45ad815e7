import { err, ok, Result } from 'neverthrow';
import type { IHaveDebugStr } from '../utils/debug.js';
import { Table } from '../utils/data-structures/table.js';
import { TableFormatError } from './errors.js';
import { DELTA, formatState, formatStates, NO_TRANSITION } from './format.js';
import { ALPHABET, InputSymbol, isInputSymbol } from './symbol.js';

export type StateId = number;

export type Transition = [from: StateId, symbol: InputSymbol, to: StateId[]];

/**
 * JSON shape of a table definition. Keys of `transitions` are state ids,
 * keys of each row are input symbols.
 */
export type TransitionTableJSON = {
  name?: string;
  accepting: number[];
  transitions: { [state: string]: { [symbol: string]: number[] } };
};

const EMPTY: ReadonlySet<StateId> = new Set();

const isStateId = (value: unknown): value is StateId =>
  typeof value == 'number' && Number.isInteger(value) && value >= 0;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value == 'object' && value !== null && !Array.isArray(value);

export class TransitionTable implements IHaveDebugStr {
  static readonly START_STATE: StateId = 0;

  readonly name: string;
  readonly acceptingStates: ReadonlySet<StateId>;
  private readonly rows: Map<StateId, Map<InputSymbol, ReadonlySet<StateId>>> =
    new Map();

  constructor(
    name: string,
    transitions: Iterable<Transition>,
    accepting: Iterable<StateId>
  ) {
    this.name = name;
    this.acceptingStates = new Set(accepting);
    for (const state of this.acceptingStates) {
      assertStateId(state);
    }
    for (const [from, symbol, to] of transitions) {
      assertStateId(from);
      to.forEach(assertStateId);
      let row = this.rows.get(from);
      if (!row) {
        row = new Map();
        this.rows.set(from, row);
      }
      row.set(symbol, new Set([...(row.get(symbol) ?? []), ...to]));
    }
  }

  /**
   * Build a table from its JSON definition.
   */
  static fromJSON(
    value: unknown,
    defaultName = 'custom'
  ): Result<TransitionTable, TableFormatError> {
    if (!isRecord(value)) {
      return err(new TableFormatError('', 'expected an object'));
    }
    const name = value.name ?? defaultName;
    if (typeof name != 'string') {
      return err(new TableFormatError('name', 'expected a string'));
    }
    const { accepting, transitions } = value;
    if (!Array.isArray(accepting) || !accepting.every(isStateId)) {
      return err(
        new TableFormatError('accepting', 'expected a list of state ids')
      );
    }
    if (!isRecord(transitions)) {
      return err(new TableFormatError('transitions', 'expected an object'));
    }

    const parsed: Transition[] = [];
    for (const [stateKey, row] of Object.entries(transitions)) {
      const from = Number(stateKey);
      if (!/^\d+$/.test(stateKey) || String(from) !== stateKey) {
        return err(
          new TableFormatError(
            `transitions.${stateKey}`,
            'expected a non-negative integer state id'
          )
        );
      }
      if (!isRecord(row)) {
        return err(
          new TableFormatError(`transitions.${stateKey}`, 'expected an object')
        );
      }
      for (const [symbol, to] of Object.entries(row)) {
        const path = `transitions.${stateKey}.${symbol}`;
        if (!isInputSymbol(symbol)) {
          return err(new TableFormatError(path, 'unknown input symbol'));
        }
        if (!Array.isArray(to) || !to.every(isStateId)) {
          return err(new TableFormatError(path, 'expected a list of state ids'));
        }
        parsed.push([from, symbol, to]);
      }
    }
    return ok(new TransitionTable(name, parsed, accepting));
  }

  /**
   * Get all the states you can get to from the given state
   * via the given symbol.
   */
  getNextStates(state: StateId, symbol: InputSymbol): ReadonlySet<StateId> {
    return this.rows.get(state)?.get(symbol) ?? EMPTY;
  }

  isAcceptingState(state: StateId): boolean {
    return this.acceptingStates.has(state);
  }

  getStartState(): StateId {
    return TransitionTable.START_STATE;
  }

  /**
   * Every state mentioned by the table, in ascending order.
   */
  get states(): StateId[] {
    const states = new Set<StateId>([
      this.getStartState(),
      ...this.acceptingStates,
    ]);
    for (const [from, row] of this.rows) {
      states.add(from);
      for (const to of row.values()) {
        to.forEach((s) => states.add(s));
      }
    }
    return [...states].sort((a, b) => a - b);
  }

  toJSON(): TransitionTableJSON {
    const transitions: TransitionTableJSON['transitions'] = {};
    for (const [from, row] of this.rows) {
      const out: { [symbol: string]: number[] } = {};
      for (const [symbol, to] of row) {
        out[symbol] = [...to];
      }
      transitions[String(from)] = out;
    }
    return {
      name: this.name,
      accepting: [...this.acceptingStates],
      transitions,
    };
  }

  private stateLabel(state: StateId) {
    let out = formatState(state);
    if (this.isAcceptingState(state)) {
      out = '*' + out;
    }
    if (state == this.getStartState()) {
      out = '>' + out;
    }
    return out;
  }

  /**
   * The table as a grid of labels: a header row with the alphabet,
   * then one row per state.
   */
  toTable(): Table<string> {
    const rows: string[][] = [[DELTA, ...ALPHABET]];
    for (const state of this.states) {
      rows.push([
        this.stateLabel(state),
        ...ALPHABET.map(
          (symbol) =>
            formatStates(
              [...this.getNextStates(state, symbol)].sort((a, b) => a - b)
            ) || NO_TRANSITION
        ),
      ]);
    }
    return Table.fromRows(rows, () => '');
  }

  toDebugStr(): string {
    return this.toTable().toDebugStr();
  }
}

function assertStateId(state: StateId) {
  if (!isStateId(state)) {
    throw new TableFormatError(
      String(state),
      'state ids must be non-negative integers'
    );
  }
}

/**
 * move(T,a)
 *
 * Set of states to which there is a transition on
 * input symbol a from some state s in T.
 */
export function move(
  table: TransitionTable,
  startStates: Iterable<StateId>,
  symbol: InputSymbol
): Set<StateId> {
  let set: Set<StateId> = new Set();
  for (const stateId of startStates) {
    for (const nextState of table.getNextStates(stateId, symbol)) {
      set.add(nextState);
    }
  }
  return set;
}

import fs from 'fs';
import { err, ok, Result } from 'neverthrow';
import { type Verdict, withAutomaton } from './automaton.js';
import type { UnacceptedSymbolError } from './errors.js';
import { getPreset, isPresetName } from './presets.js';
import type { DriverReporter } from './reporter.js';
import { parseSymbol } from './symbol.js';
import { TransitionTable } from './transition-table.js';

export const TOKEN_SEPARATOR = '#';
export const NO_CONTENT_MESSAGE =
  'File not found, is not readable or has no content';

export type TokenRun = {
  token: string;
  verdict: Verdict;
  error?: UnacceptedSymbolError;
};

/**
 * Split text into trimmed, non-blank tokens.
 */
export function splitTokens(text: string, separator = TOKEN_SEPARATOR) {
  return text
    .split(separator)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Feed every character of the token into a fresh automaton. Reading stops
 * at the first character outside the alphabet, and the automaton is
 * finalized with whatever it read up to that point.
 */
export function runToken(
  token: string,
  table: TransitionTable,
  reporter: DriverReporter
): TokenRun {
  reporter.token(token);
  const { result, verdict } = withAutomaton(
    table,
    reporter,
    (automaton): Result<number, UnacceptedSymbolError> => {
      let consumed = 0;
      for (const character of token) {
        const symbol = parseSymbol(character);
        if (symbol.isErr()) {
          reporter.error(symbol.error);
          return err(symbol.error);
        }
        automaton.consume(symbol.value);
        consumed++;
      }
      return ok(consumed);
    }
  );
  return result.match<TokenRun>(
    () => ({ token, verdict }),
    (error) => ({ token, verdict, error })
  );
}

export function runText(
  text: string,
  table: TransitionTable,
  reporter: DriverReporter,
  separator = TOKEN_SEPARATOR
): TokenRun[] {
  const tokens = splitTokens(text, separator);
  if (tokens.length == 0) {
    reporter.message(NO_CONTENT_MESSAGE);
    return [];
  }
  return tokens.map((token) => runToken(token, table, reporter));
}

export type TableOptions = { preset: string; table?: string };

/**
 * Load the table named by the options. A table file wins over the preset.
 */
export function loadTable(options: TableOptions): TransitionTable {
  if (options.table) {
    const json: unknown = JSON.parse(fs.readFileSync(options.table, 'utf8'));
    const result = TransitionTable.fromJSON(json, options.table);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }
  if (!isPresetName(options.preset)) {
    throw new Error(`Unknown preset ${options.preset}`);
  }
  return getPreset(options.preset);
}

/**
 * The contents of the file, or an empty string when there is no
 * regular file at the given path.
 */
export function readTokenFile(filepath: string): string {
  if (!fs.existsSync(filepath) || !fs.statSync(filepath).isFile()) {
    return '';
  }
  return fs.readFileSync(filepath, 'utf8');
}

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  loadTable,
  NO_CONTENT_MESSAGE,
  readTokenFile,
  runText,
  runToken,
  splitTokens,
} from './driver.js';
import { TableFormatError, UnacceptedSymbolError } from './errors.js';
import { getPreset } from './presets.js';
import { NullReporter, TextReporter } from './reporter.js';

function recorder() {
  const lines: string[] = [];
  return { lines, reporter: new TextReporter((line) => lines.push(line)) };
}

describe('splitTokens', () => {
  test('trims tokens and drops blank ones', () => {
    expect(splitTokens(' 01 # #2223#\n12x3 \n')).toEqual([
      '01',
      '2223',
      '12x3',
    ]);
  });

  test('custom separator', () => {
    expect(splitTokens('0,1#2, ,3', ',')).toEqual(['0', '1#2', '3']);
  });

  test('nothing but separators', () => {
    expect(splitTokens(' # \n #')).toEqual([]);
  });
});

describe('runToken', () => {
  const fiveState = getPreset('five-state');
  const tenState = getPreset('ten-state');

  test('accepts 2223 on the five-state table', () => {
    const { lines, reporter } = recorder();
    const run = runToken('2223', fiveState, reporter);
    expect(run).toEqual({
      token: '2223',
      verdict: { finalState: 3, accepting: true, path: [0, 0, 0, 1, 3] },
    });
    expect(lines).toEqual([
      '',
      'Reading token: 2223',
      'Current automaton states: q0',
      'Reading symbol: 2',
      'Current automaton states: {q0, q1}',
      'Reading symbol: 2',
      'Current automaton states: {q0, q1, q2}',
      'Reading symbol: 2',
      'Symbol 2 was tripled 1 times already',
      'Current automaton states: {q0, q1, q2}',
      'Reading symbol: 3',
      'Symbol 2 was tripled 1 times already',
      'Current automaton states: {q0, q2, q3}',
      'Final automaton state: q3 (accepting)',
      'State change path: q0→q0→q0→q1→q3',
    ]);
  });

  test('stops at an unaccepted symbol and still finalizes', () => {
    const { lines, reporter } = recorder();
    const run = runToken('12x3', fiveState, reporter);
    expect(run.error).toBeInstanceOf(UnacceptedSymbolError);
    expect(run.error?.character).toBe('x');
    expect(run.verdict).toEqual({
      finalState: 1,
      accepting: false,
      path: [0, 0, 1],
    });
    expect(lines).toEqual([
      '',
      'Reading token: 12x3',
      'Current automaton states: q0',
      'Reading symbol: 1',
      'Current automaton states: q0',
      'Reading symbol: 2',
      'Current automaton states: {q0, q1}',
      "Automaton doesn't accept symbol: x",
      'Final automaton state: q1 (rejecting)',
      'State change path: q0→q0→q1',
    ]);
  });

  test('only the prefix before the error is consumed', () => {
    const run = runToken('12x3', tenState, new NullReporter());
    expect(run.verdict).toEqual({
      finalState: 3,
      accepting: false,
      path: [0, 0, 3],
    });
  });

  test('an unaccepted first character leaves the start state', () => {
    const run = runToken('a0', tenState, new NullReporter());
    expect(run.error?.character).toBe('a');
    expect(run.verdict).toEqual({ finalState: 0, accepting: false, path: [0] });
  });
});

describe('runText', () => {
  const tenState = getPreset('ten-state');

  test('runs every token with its own automaton', () => {
    const runs = runText('0000 # 1x # 0123', tenState, new NullReporter());
    expect(runs.map((run) => run.token)).toEqual(['0000', '1x', '0123']);
    expect(runs.map((run) => run.verdict.accepting)).toEqual([
      true,
      false,
      false,
    ]);
    expect(runs.map((run) => run.verdict.finalState)).toEqual([9, 2, 4]);
    expect(runs.map((run) => run.error?.character)).toEqual([
      undefined,
      'x',
      undefined,
    ]);
  });

  test('reports when there is nothing to read', () => {
    const { lines, reporter } = recorder();
    expect(runText('  #  ', tenState, reporter)).toEqual([]);
    expect(lines).toEqual([NO_CONTENT_MESSAGE]);
  });
});

describe('files', () => {
  let dir: string;
  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quad-nfa-'));
  });
  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('loadTable', () => {
    test('loads a preset', () => {
      expect(loadTable({ preset: 'five-state' })).toBe(
        getPreset('five-state')
      );
    });

    test('rejects an unknown preset', () => {
      expect(() => loadTable({ preset: 'six-state' })).toThrow(
        'Unknown preset six-state'
      );
    });

    test('a table file overrides the preset', () => {
      const file = path.join(dir, 'custom.json');
      fs.writeFileSync(
        file,
        JSON.stringify({ accepting: [1], transitions: { '0': { '0': [1] } } })
      );
      const table = loadTable({ preset: 'ten-state', table: file });
      expect(table.name).toBe(file);
      expect(table.states).toEqual([0, 1]);
      expect(loadTable({ preset: 'six-state', table: file }).states).toEqual([
        0, 1,
      ]);
    });

    test('rejects an invalid table file', () => {
      const file = path.join(dir, 'invalid.json');
      fs.writeFileSync(file, JSON.stringify({ accepting: 'x', transitions: {} }));
      expect(() => loadTable({ preset: 'ten-state', table: file })).toThrow(
        TableFormatError
      );
      expect(() => loadTable({ preset: 'ten-state', table: file })).toThrow(
        'TableFormatError at accepting: expected a list of state ids'
      );
    });
  });

  describe('readTokenFile', () => {
    test('reads a regular file', () => {
      const file = path.join(dir, 'tokens.txt');
      fs.writeFileSync(file, '01#2223');
      expect(readTokenFile(file)).toBe('01#2223');
    });

    test('a missing file has no content', () => {
      const { lines, reporter } = recorder();
      const text = readTokenFile(path.join(dir, 'missing.txt'));
      expect(text).toBe('');
      expect(runText(text, getPreset('ten-state'), reporter)).toEqual([]);
      expect(lines).toEqual([NO_CONTENT_MESSAGE]);
    });

    test('a directory has no content', () => {
      const { lines, reporter } = recorder();
      expect(runText(readTokenFile(dir), getPreset('ten-state'), reporter)).toEqual(
        []
      );
      expect(lines).toEqual([
        'File not found, is not readable or has no content',
      ]);
    });
  });
});

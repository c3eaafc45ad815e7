import fs from 'fs';

/**
 * Common type declaractions
 */

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;
class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;
  private verbose = false;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Print log lines to stdout even when DEBUG is not set.
   */
  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  /**
   * Whether anything would receive a log line.
   */
  get enabled(): boolean {
    return (
      this.listeners.size > 0 ||
      this.verbose ||
      Boolean(process.env.DEBUG) ||
      Boolean(process.env.DEBUG_FILE)
    );
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (this.verbose || process.env.DEBUG) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  black: '\u001b[30m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  magenta: '\u001b[35m',
  cyan: '\u001b[36m',
  white: '\u001b[37m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  underline: '\u001b[4m',
  reversed: '\u001b[7m',
};
type ColorName = keyof typeof ColorCodes;
type ColorFuncs = {
  [Property in ColorName]: (s: string) => string;
};

const colorize =
  (color: ColorName) =>
  (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;

const colors: ColorFuncs = {
  black: colorize('black'),
  red: colorize('red'),
  green: colorize('green'),
  yellow: colorize('yellow'),
  blue: colorize('blue'),
  magenta: colorize('magenta'),
  cyan: colorize('cyan'),
  white: colorize('white'),
  reset: colorize('reset'),
  bold: colorize('bold'),
  underline: colorize('underline'),
  reversed: colorize('reversed'),
};
export { colors };

#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createInterface } from 'readline/promises';
import { logger, useColors } from '../utils/debug.js';
import {
  loadTable,
  readTokenFile,
  runText,
  TOKEN_SEPARATOR,
} from './driver.js';
import { DEFAULT_PRESET, PRESET_NAMES } from './presets.js';
import { TextReporter } from './reporter.js';

async function promptForPath(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question('Please enter file path: ')).trim();
  } finally {
    rl.close();
  }
}

function builder<T>(yargs: yargs.Argv<T>) {
  return yargs
    .option('preset', {
      alias: 'p',
      type: 'string',
      choices: PRESET_NAMES,
      description: 'Transition table to run',
      default: DEFAULT_PRESET,
    })
    .option('table', {
      alias: 't',
      type: 'string',
      description: 'JSON file with a custom transition table',
    })
    .option('colors', {
      type: 'boolean',
      description: 'Colorize the output',
      default: false,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'Run with verbose logging',
      default: false,
    });
}

const parser = yargs(hideBin(process.argv))
  .scriptName('quad-nfa')
  .command({
    command: 'run [file]',
    describe: 'run the automaton over every token of a file',
    aliases: ['$0'],
    builder: (yargs) =>
      builder(yargs)
        .positional('file', {
          describe: 'file with tokens to read',
          type: 'string',
        })
        .option('separator', {
          alias: 's',
          type: 'string',
          description: 'Token separator',
          default: TOKEN_SEPARATOR,
        }),
    handler: async (args) => {
      useColors(args.colors);
      logger.setVerbose(args.verbose);
      const table = loadTable(args);
      console.log('Transition table:');
      process.stdout.write(table.toDebugStr());
      const filepath = args.file ?? (await promptForPath());
      runText(
        readTokenFile(filepath),
        table,
        new TextReporter(),
        args.separator
      );
    },
  })
  .command({
    command: 'table',
    describe: 'print the transition table',
    builder,
    handler: async (args) => {
      useColors(args.colors);
      process.stdout.write(loadTable(args).toDebugStr());
    },
  })
  .strict();

(async () => {
  try {
    await parser.parseAsync();
  } catch (e) {
    console.error(`An error occurred: ${e instanceof Error ? e.message : e}`);
    process.exitCode = 1;
  }
})();

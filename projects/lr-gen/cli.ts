#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs';
import { logger, useColors } from '../utils/debug.js';
import { runGenerate, runParse, type CommandOptions } from './commands.js';
import { fromEnv, loadConfig } from './config.js';

type GlobalArgs = {
  type?: string;
  start?: string;
  json: boolean;
  verbose: boolean;
  maxSteps?: number;
  tokenizer?: string;
};

const output = {
  out: (text: string) => console.log(text),
  err: (text: string) => console.error(text),
};

function commandOptions(argv: GlobalArgs): CommandOptions | undefined {
  if (!argv.json) {
    useColors(process.stdout.isTTY === true);
  }
  if (argv.verbose) {
    logger.subscribe((...args) => console.error(...args));
  }
  const config = loadConfig(fromEnv(), {
    type: argv.type,
    start: argv.start,
    maxSteps: argv.maxSteps,
    tokenizer: argv.tokenizer,
  });
  if (config.isErr()) {
    console.error(config.error.message);
    process.exitCode = 1;
    return undefined;
  }
  return { ...config.value, json: argv.json };
}

const parser = yargs(hideBin(process.argv))
  .scriptName('lr-gen')
  .option('type', {
    alias: 't',
    describe: 'kind of table to build: lr0 or slr1',
    type: 'string',
  })
  .option('start', {
    describe: 'start symbol, defaults to the first rule',
    type: 'string',
  })
  .option('json', {
    describe: 'print the response as JSON',
    type: 'boolean',
    default: false,
  })
  .option('verbose', {
    alias: 'v',
    describe: 'log every construction and parse step to stderr',
    type: 'boolean',
    default: false,
  })
  .command({
    command: 'generate <file>',
    describe: 'build LR(0) or SLR(1) tables for a grammar file',
    builder: (yargs) =>
      yargs.positional('file', {
        describe: 'grammar file, one rule per line',
        type: 'string',
        demandOption: true,
      }),
    handler: (argv) => {
      const options = commandOptions(argv);
      if (!options) {
        return;
      }
      const text = fs.readFileSync(argv.file, { encoding: 'utf-8' });
      process.exitCode = runGenerate(text, options, output);
    },
  })
  .command({
    command: 'parse <file> <input>',
    describe: 'parse a string of tokens with the tables built for a grammar',
    builder: (yargs) =>
      yargs
        .positional('file', {
          describe: 'grammar file, one rule per line',
          type: 'string',
          demandOption: true,
        })
        .positional('input', {
          describe: 'input tokens, separated by whitespace',
          type: 'string',
          demandOption: true,
        })
        .option('max-steps', {
          describe: 'give up after this many parser steps',
          type: 'number',
        })
        .option('tokenizer', {
          describe: 'simple or longest',
          type: 'string',
        }),
    handler: (argv) => {
      const options = commandOptions(argv);
      if (!options) {
        return;
      }
      const text = fs.readFileSync(argv.file, { encoding: 'utf-8' });
      process.exitCode = runParse(text, argv.input, options, output);
    },
  })
  .demandCommand(1)
  .strict();

parser.parseSync();

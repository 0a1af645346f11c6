#!/usr/bin/env node

import { Command } from 'commander';

import { createParseCommand } from './commands/parse.js';
import { createReplCommand, startRepl } from './commands/repl.js';
import { createRecognizersCommand } from './commands/recognizers.js';
import { ENV_LANG, ENV_ORDER, ENV_TODAY } from './config.js';
import type { CliOptions } from './config.js';

// Build the CLI program
const program = new Command()
  .name('dateparse')
  .description('Recognize dates in short human-typed fragments')
  .version('0.1.0')
  .option('-l, --lang <code>', `Language: en or ru (env ${ENV_LANG})`)
  .option('-o, --order <order>', `Numeric date order: dmy or mdy (env ${ENV_ORDER})`)
  .option('-t, --today <yyyy-mm-dd>', `Reference date (env ${ENV_TODAY}, default: the local date)`)
  .option('-v, --verbose', 'Show why each alternative failed');

// Register commands
program.addCommand(createParseCommand());
program.addCommand(createReplCommand());
program.addCommand(createRecognizersCommand());

// Default action (no command): interactive mode
program.action((opts: CliOptions) => startRepl(opts));

await program.parseAsync();

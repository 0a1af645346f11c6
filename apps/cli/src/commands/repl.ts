import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { formatDate } from '@dateparse/core';
import { resolveConfig } from '../config.js';
import type { CliConfig, CliOptions } from '../config.js';
import { versatileParser } from '../helpers.js';
import * as out from '../output.js';

/** Read fragments line by line and print the date each one names. */
export function runRepl(config: CliConfig): Promise<void> {
  const recognizer = versatileParser(config);
  out.info(`today is ${formatDate(config.reference)}; enter a date, or an empty line to quit`);

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  return new Promise(resolve => {
    rl.on('line', line => {
      const input = line.trim();
      if (input === '') {
        rl.close();
        return;
      }
      out.printMatch(input, recognizer.match(input, config.reference), config.verbose);
      rl.prompt();
    });
    rl.on('close', () => resolve());
    rl.prompt();
  });
}

/** Resolve the configuration, then start the loop; configuration errors are printed */
export async function startRepl(opts: CliOptions): Promise<void> {
  let config: CliConfig;
  try {
    config = resolveConfig(opts);
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return;
  }
  await runRepl(config);
}

export function createReplCommand(): Command {
  return new Command('repl')
    .description('Parse dates interactively')
    .action((_opts: unknown, cmd: Command) => startRepl(cmd.optsWithGlobals<CliOptions>()));
}

import { Command } from 'commander';
import { resolveConfig } from '../config.js';
import type { CliOptions } from '../config.js';
import { createRegistry, selectRecognizer, $try } from '../helpers.js';
import * as out from '../output.js';

interface ParseOptions extends CliOptions {
  with?: string;
  complete?: boolean;
}

export function createParseCommand(): Command {
  return new Command('parse')
    .description('Recognize a date in a text fragment')
    .argument('<text...>', 'The fragment to parse (words are joined with spaces)')
    .option('-w, --with <name>', 'Use a registered recognizer instead of the versatile parser')
    .option('-c, --complete', 'Require the whole fragment to be consumed')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() => {
      const opts = cmd.optsWithGlobals<ParseOptions>();
      const config = resolveConfig(opts);
      const registry = createRegistry(config);
      const recognizer = selectRecognizer(config, registry, opts.with, opts.complete ?? false);

      const input = words.join(' ');
      out.printMatch(input, recognizer.match(input, config.reference), config.verbose);
    }));
}

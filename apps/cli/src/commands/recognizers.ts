import { Command } from 'commander';
import { resolveConfig } from '../config.js';
import type { CliOptions } from '../config.js';
import { createRegistry, $try } from '../helpers.js';
import * as out from '../output.js';

export function createRecognizersCommand(): Command {
  return new Command('recognizers')
    .description('List the recognizers available for the configured language')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const config = resolveConfig(cmd.optsWithGlobals<CliOptions>());
      const list = createRegistry(config).list();
      const width = Math.max(...list.map(r => r.name.length));

      for (const r of list) {
        out.info(out.formatRecognizerRow(r, width));
      }
      out.info(`\n${list.length} recognizers; append ".standalone" to a name to require a whole-input match`);
    }));
}

import { Command } from 'commander';

import { createEnvCommand } from './commands/env.js';
import { createPrintCommand } from './commands/print.js';
import { createValidateCommand } from './commands/validate.js';
import type { CliContext } from './context.js';

export function createProgram(context: CliContext, version: string): Command {
  const program = new Command();

  program
    .name('svc-manifest')
    .description('Validate service deployment manifests')
    .version(version)
    .configureOutput({
      writeOut: (str) => context.stdout.write(str),
      writeErr: (str) => context.stderr.write(str),
    })
    .option('--verbose', 'Log loader activity to stderr')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().verbose === true) {
        context.logger.level = 'debug';
      }
    });

  program.addCommand(createValidateCommand(context));
  program.addCommand(createPrintCommand(context));
  program.addCommand(createEnvCommand(context));

  return program;
}

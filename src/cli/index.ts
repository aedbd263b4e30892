import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createNewCommand } from './commands/new.js';
import { createDepsCommand } from './commands/deps.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('springinit')
    .description('Scaffold Spring Boot projects from the command line')
    .version(VERSION)
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show the command output')
    .hook('preAction', (command) => {
      const options = command.opts<{ verbose?: boolean; quiet?: boolean }>();
      if (options.quiet) {
        logger.setLevel('silent');
      } else if (options.verbose) {
        logger.setLevel('debug');
      }
    });

  program.addCommand(createNewCommand(), { isDefault: true });
  program.addCommand(createDepsCommand());
  return program;
}

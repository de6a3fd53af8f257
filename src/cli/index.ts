/**
 * @arch lintcache.cli.barrel
 */
import { Command } from 'commander';
import { getCurrentVersion } from '../core/version.js';
import { createInfoCommand } from './commands/info.js';
import { createShowCommand } from './commands/show.js';
import { createClearCommand } from './commands/clear.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('lintcache')
    .description('Inspect and clear persisted lint results')
    .version(getCurrentVersion());
  [createInfoCommand, createShowCommand, createClearCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}

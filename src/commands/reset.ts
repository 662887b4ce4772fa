import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createStoreContext } from '../cli/context.js';

export function setupResetCommand(program: Command): void {
  program
    .command('reset')
    .description('Erase the declared dependencies of every client')
    .action(
      withErrorHandling(async (_options: object, command: Command) => {
        const ctx = await createStoreContext(command);
        await ctx.store.deleteAll();
        ctx.output.success(`Removed every client dependency file from ${ctx.config.settingsDir}`);
      })
    );
}

import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliContext } from '../cli/context.js';

export function setupClearCommand(program: Command): void {
  program
    .command('clear')
    .description('Remove every dependency declared by the selected client')
    .action(
      withErrorHandling(async (_options: object, command: Command) => {
        const ctx = await createCliContext(command);
        await ctx.client.clearDependencies();
        ctx.output.success(`Cleared dependencies of ${ctx.client.clientName}`);
      })
    );
}

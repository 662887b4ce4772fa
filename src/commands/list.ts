import { Command } from 'commander';
import pc from 'picocolors';

import { withErrorHandling } from '../utils/errors.js';
import { createStoreContext } from '../cli/context.js';
import type { DependencyRecord } from '../types/index.js';

export function formatRecord(record: DependencyRecord): string {
  let line = `${record.groupId}:${record.artifactId}:${pc.cyan(record.version)}`;
  if (record.packageIds && record.packageIds.length > 0) {
    line += pc.dim(` packages: ${record.packageIds.join(' ')}`);
  }
  if (record.repositories && record.repositories.length > 0) {
    line += pc.dim(` repositories: ${record.repositories.join(' ')}`);
  }
  return line;
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('Show the dependencies declared by every client')
    .action(
      withErrorHandling(async (_options: object, command: Command) => {
        const ctx = await createStoreContext(command);
        const clients = await ctx.store.listClients();

        if (clients.length === 0) {
          ctx.output.info(`No dependencies declared in ${ctx.config.settingsDir}`);
          return;
        }

        for (const clientName of clients) {
          const records = await ctx.store.read(clientName);
          const lines = records.length > 0 ? records.map(formatRecord) : [pc.dim('(none)')];
          ctx.output.note(lines.join('\n'), clientName);
        }
      })
    );
}

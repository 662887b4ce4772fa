import { Command } from 'commander';
import pc from 'picocolors';

import { withErrorHandling } from '../utils/errors.js';
import { createCliContext } from '../cli/context.js';
import type { ResolvedDependencies } from '../core/resolution/resolution-engine.js';

interface ResolveOptions {
  latest?: boolean;
}

export function formatResolved(resolved: ResolvedDependencies): string {
  return [...resolved.keys()]
    .sort()
    .map(versionlessKey => {
      const dep = resolved.get(versionlessKey);
      const version = dep?.bestVersion ?? pc.red('unresolved');
      return `${versionlessKey} ${pc.green(version)}`;
    })
    .join('\n');
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve the dependencies of every client to one version per artifact')
    .option('--latest', 'settle version conflicts with the newest version instead of failing')
    .action(
      withErrorHandling(async (options: ResolveOptions, command: Command) => {
        const ctx = await createCliContext(command, { useLatest: options.latest ? true : undefined });

        const spinner = ctx.output.spinner();
        spinner.start('Resolving dependencies');
        const resolved = await ctx.client.resolveDependencies(ctx.config.useLatest);
        spinner.stop(`Resolved ${resolved.size} ${resolved.size === 1 ? 'artifact' : 'artifacts'}`);

        if (resolved.size > 0) {
          ctx.output.note(formatResolved(resolved), 'Resolved dependencies');
        }
      })
    );
}

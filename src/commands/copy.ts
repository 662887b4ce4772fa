import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, type CliContext } from '../cli/context.js';
import type { OverwriteConfirmation } from '../core/deploy/artifact-deployer.js';

interface CopyOptions {
  latest?: boolean;
  yes?: boolean;
}

function createConfirmation(ctx: CliContext, options: CopyOptions): OverwriteConfirmation {
  return async (oldDep, newDep) => {
    if (options.yes) return true;
    if (!ctx.interactive) {
      ctx.output.warn(`Keeping ${oldDep.key}; rerun with --yes to replace it with ${newDep.key}`);
      return false;
    }
    return ctx.output.confirm(`Replace ${oldDep.key} with ${newDep.key}?`, { initial: true });
  };
}

export function setupCopyCommand(program: Command): void {
  program
    .command('copy')
    .argument('[dest]', 'directory to deploy the resolved artifacts into (default: libs, or "destination" in m2resolve.jsonc)')
    .description('Resolve the dependencies of every client and copy the artifacts into a directory')
    .option('--latest', 'settle version conflicts with the newest version instead of failing')
    .option('-y, --yes', 'replace other versions already in the destination without asking')
    .action(
      withErrorHandling(async (dest: string | undefined, options: CopyOptions, command: Command) => {
        const ctx = await createCliContext(command, {
          destination: dest,
          useLatest: options.latest ? true : undefined
        });

        const resolved = await ctx.client.resolveDependencies(ctx.config.useLatest);
        const report = await ctx.client.copyDependencies(
          resolved,
          ctx.config.destination,
          createConfirmation(ctx, options)
        );

        for (const path of report.copied) {
          ctx.output.message(`Copied ${path}`);
        }
        for (const key of report.declined) {
          ctx.output.warn(`Skipped ${key}`);
        }
        ctx.output.success(
          `${report.copied.length} copied, ${report.upToDate.length} up to date, ` +
          `${report.removed.length} removed in ${ctx.config.destination}`
        );
      })
    );
}

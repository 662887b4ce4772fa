import { resolve } from 'path';
import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { parseCoordinate } from '../utils/coordinate.js';
import { createCliContext } from '../cli/context.js';

interface DependOptions {
  packageId?: string[];
  repo?: string[];
}

export function setupDependCommand(program: Command): void {
  program
    .command('depend')
    .argument('<coordinate>', 'artifact to depend on, as group:artifact:version (version may end in + or be LATEST)')
    .description('Declare a dependency for the selected client')
    .option('--package-id <ids...>', 'Android SDK packages that provide the artifact')
    .option('--repo <paths...>', 'extra local Maven repositories to search for the artifact')
    .action(
      withErrorHandling(async (coordinate: string, options: DependOptions, command: Command) => {
        const { group, artifact, version } = parseCoordinate(coordinate);
        const ctx = await createCliContext(command);

        const repositories = options.repo?.map(repo => resolve(ctx.cwd, repo));
        const dep = await ctx.client.dependOn(group, artifact, version, options.packageId, repositories);

        if (dep.hasPossibleVersions) {
          ctx.output.success(`${ctx.client.clientName} depends on ${dep}`);
        } else {
          ctx.output.warn(`${ctx.client.clientName} depends on ${dep}, but no installed version was found`);
        }
      })
    );
}

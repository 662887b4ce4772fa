/**
 * CLI Context Factory
 *
 * Builds everything a command handler needs from the global options:
 * effective configuration, the registered dependency client, and the
 * output port matching the terminal (Clack in a TTY, plain console otherwise).
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import { loadConfig, type ConfigOverrides } from '../core/config.js';
import { DependencyClient } from '../core/dependency-client.js';
import { ClientStore } from '../core/clients/client-store.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';
import { logger } from '../utils/logger.js';
import type { Logger, ResolverConfig } from '../types/index.js';
import { DEFAULT_CLIENT } from '../constants/index.js';

export type GlobalOptions = {
  cwd?: string;
  sdk?: string;
  settings?: string;
  repository?: string[];
  client?: string;
};

/** Context for commands that only touch the client files. */
export interface StoreContext {
  cwd: string;
  config: ResolverConfig;
  store: ClientStore;
  output: OutputPort;
  interactive: boolean;
}

export interface CliContext extends StoreContext {
  client: DependencyClient;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Logger handed to the core: resolution warnings are shown to the user,
 * everything else follows the process log level.
 */
export function createCliLogger(output: OutputPort): Logger {
  return {
    debug: (message, meta) => logger.debug(message, meta),
    info: (message, meta) => logger.info(message, meta),
    warn: message => output.warn(message),
    error: (message, meta) => logger.error(message, meta)
  };
}

/**
 * Configuration, output port and client store, without registering a client.
 * Needs no SDK path and searches no repository.
 */
export async function createStoreContext(
  command: Command,
  overrides: ConfigOverrides = {},
  interactive?: boolean
): Promise<StoreContext> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const cwd = resolve(process.cwd(), globals.cwd ?? '.');

  const config = await loadConfig(cwd, {
    ...overrides,
    sdkPath: globals.sdk,
    settingsDir: globals.settings,
    repositories: globals.repository
  });

  const isInteractive = detectInteractive(interactive);
  const output = isInteractive ? (cachedClackOutput ??= createClackOutput()) : consoleOutput;
  const store = new ClientStore(config.settingsDir, createCliLogger(output));

  return { cwd, config, store, output, interactive: isInteractive };
}

export async function createCliContext(
  command: Command,
  overrides: ConfigOverrides = {},
  interactive?: boolean
): Promise<CliContext> {
  const ctx = await createStoreContext(command, overrides, interactive);
  const globals = command.optsWithGlobals<GlobalOptions>();

  const client = await DependencyClient.register(
    globals.client ?? DEFAULT_CLIENT,
    ctx.config.sdkPath,
    ctx.config.repositories,
    ctx.config.settingsDir,
    { logger: createCliLogger(ctx.output) }
  );

  return { ...ctx, client };
}

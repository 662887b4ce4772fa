/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 * Used whenever no interactive terminal is available.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${title}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },

  async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
    // In non-interactive mode, return the default value
    return options?.initial ?? false;
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? msg}`);
      },
      message(text: string) {
        msg = text;
      },
    };
  },
};

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  ConfigError,
  SupervisorError,
  debugLogger,
} from '@logwatch-keeper/core';
import { supervisorOptions } from './config/config.js';
import { restartCommand } from './commands/restart.js';
import { statusCommand } from './commands/status.js';
import { stopCommand } from './commands/stop.js';

export function buildParser(args: string[]) {
  return yargs(args)
    .scriptName('logwatch-keeper')
    .usage('$0 [command] [options]')
    .options(supervisorOptions)
    .middleware((argv) => {
      if (argv.debug) {
        debugLogger.setDebugEnabled(true);
      }
    })
    .command(restartCommand)
    .command(stopCommand)
    .command(statusCommand)
    .strict()
    .fail((msg, err) => {
      if (err) throw err;
      throw new ConfigError(msg);
    })
    .help();
}

/**
 * Runs the command line and resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await buildParser(hideBin(argv)).parseAsync();
    return 0;
  } catch (error) {
    if (error instanceof SupervisorError) {
      debugLogger.error(error.message);
      return error.exitCode;
    }
    debugLogger.error('Unexpected error:', error);
    return 1;
  }
}

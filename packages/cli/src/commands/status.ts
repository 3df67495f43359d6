/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { WatchSupervisor, debugLogger } from '@logwatch-keeper/core';
import { loadCliConfig, parseCliArgs } from '../config/config.js';

export const statusCommand: CommandModule = {
  command: 'status',
  describe: 'List running watcher processes',
  handler: async (argv) => {
    const config = loadCliConfig(parseCliArgs(argv));
    const matches = await new WatchSupervisor(config).status();
    if (matches.length === 0) {
      debugLogger.log('no watcher running');
      return;
    }
    for (const match of matches) {
      debugLogger.log(`${match.pid}  ${match.commandLine}`);
    }
  },
};

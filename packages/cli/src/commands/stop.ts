/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { WatchSupervisor, debugLogger } from '@logwatch-keeper/core';
import { loadCliConfig, parseCliArgs } from '../config/config.js';

export const stopCommand: CommandModule = {
  command: 'stop',
  describe: 'Stop every running watcher without starting a new one',
  handler: async (argv) => {
    const config = loadCliConfig(parseCliArgs(argv));
    const { signalled } = await new WatchSupervisor(config).stop();
    if (signalled.length === 0) {
      debugLogger.log('no watcher running');
    } else {
      debugLogger.log(`stopped ${signalled.length} watcher(s)`);
    }
  },
};

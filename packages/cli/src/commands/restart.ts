/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { WatchSupervisor, debugLogger } from '@logwatch-keeper/core';
import { loadCliConfig, parseCliArgs } from '../config/config.js';

export const restartCommand: CommandModule = {
  command: ['restart', '$0'],
  describe: 'Stop every running watcher, then start exactly one new one',
  handler: async (argv) => {
    const config = loadCliConfig(parseCliArgs(argv));
    debugLogger.debug(
      'restart',
      `Supervising "${config.getCommandLine()}" in ${config.getServerDir()}`,
    );
    const supervisor = new WatchSupervisor(config);
    const { reaped, handle } = await supervisor.run();
    debugLogger.debug(
      'restart',
      `Replaced ${reaped.signalled.length} watcher(s); tail ${handle.tailPid}, tee ${handle.teePid}`,
    );
  },
};

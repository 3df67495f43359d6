/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { debugLogger } from '../utils/debugLogger.js';

export type ProcessKill = (pid: number, signal: NodeJS.Signals | 0) => void;

const defaultKill: ProcessKill = (pid, signal) => {
  process.kill(pid, signal);
};

/**
 * Tracks the members of a pipeline while it is being started, so that a
 * failed launch does not leave half a pipeline running.
 */
export class BackgroundProcessManager {
  private pids: Set<number> = new Set();

  constructor(private readonly processKill: ProcessKill = defaultKill) {}

  register(pid: number) {
    this.pids.add(pid);
  }

  /**
   * Stops tracking every process without signalling it. Called once the
   * pipeline is fully started and should outlive the supervisor.
   */
  release(): number[] {
    const released = [...this.pids];
    this.pids.clear();
    return released;
  }

  /**
   * Sends SIGTERM to every registered process that still exists and returns
   * the pids that were signalled.
   */
  cleanup(): number[] {
    const killed: number[] = [];
    if (this.pids.size === 0) {
      return killed;
    }

    debugLogger.debug(
      'BackgroundProcessManager',
      `Cleaning up ${this.pids.size} pipeline process(es)...`,
    );

    for (const pid of this.pids) {
      try {
        this.processKill(pid, 0);
      } catch {
        // Already gone.
        continue;
      }

      try {
        // Detached children lead their own process group.
        try {
          this.processKill(-pid, 'SIGTERM');
        } catch {
          this.processKill(pid, 'SIGTERM');
        }
        killed.push(pid);
      } catch (error) {
        debugLogger.error(
          'BackgroundProcessManager',
          `Failed to kill process ${pid}:`,
          error,
        );
      }
    }
    this.pids.clear();
    return killed;
  }
}

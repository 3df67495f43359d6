/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ProcessEntry, ProcessTable } from '../services/processTable.js';

/**
 * In-memory process table. `kill` removes entries the way a real SIGTERM
 * would, except for pids marked as stubborn, which only SIGKILL removes.
 */
export class FakeProcessTable implements ProcessTable {
  private entries = new Map<number, ProcessEntry>();
  private nextPid = 100;
  readonly stubborn = new Set<number>();
  listCalls = 0;
  failWith: Error | undefined;

  add(argv: string[], pid = this.nextPid++, ppid = 1): number {
    this.entries.set(pid, { pid, ppid, argv, commandLine: argv.join(' ') });
    if (pid >= this.nextPid) this.nextPid = pid + 1;
    return pid;
  }

  remove(pid: number) {
    this.entries.delete(pid);
  }

  has(pid: number): boolean {
    return this.entries.has(pid);
  }

  async list(): Promise<ProcessEntry[]> {
    this.listCalls++;
    if (this.failWith) throw this.failWith;
    return [...this.entries.values()].map((entry) => ({
      ...entry,
      argv: [...entry.argv],
    }));
  }

  kill = (pid: number, signal: NodeJS.Signals | 0): void => {
    if (!this.entries.has(pid)) {
      throw Object.assign(new Error(`kill ESRCH ${pid}`), { code: 'ESRCH' });
    }
    if (signal === 0) return;
    if (signal === 'SIGKILL' || !this.stubborn.has(pid)) {
      this.entries.delete(pid);
    }
  };
}

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SupervisorConfig } from '../config/config.js';
import { debugLogger } from '../utils/debugLogger.js';
import type { ProcessKill } from './backgroundProcessManager.js';
import {
  ensureLogFile,
  launch,
  type LaunchOptions,
  type WatchProcessHandle,
} from './launcher.js';
import { findMatches, type ProcessMatch } from './processFinder.js';
import { createProcessTable, type ProcessTable } from './processTable.js';
import { reapAll, type ReapResult } from './reaper.js';

export type SupervisorState = 'START' | 'CLEAN' | 'READY' | 'RUNNING';

export interface SupervisorDependencies {
  processTable?: ProcessTable;
  processKill?: ProcessKill;
  sleep?: (ms: number) => Promise<void>;
  launch?: (options: LaunchOptions) => Promise<WatchProcessHandle>;
  selfPid?: number;
}

export interface SupervisorRunResult {
  reaped: ReapResult;
  handle: WatchProcessHandle;
}

/**
 * One-shot "ensure a single watcher" flow: START -> CLEAN -> READY -> RUNNING.
 * Nothing is monitored after the watcher has been launched.
 */
export class WatchSupervisor {
  private state: SupervisorState = 'START';
  private readonly processTable: ProcessTable;

  constructor(
    private readonly config: SupervisorConfig,
    private readonly deps: SupervisorDependencies = {},
  ) {
    this.processTable = deps.processTable ?? createProcessTable();
  }

  getState(): SupervisorState {
    return this.state;
  }

  private transition(next: SupervisorState) {
    debugLogger.debug('WatchSupervisor', `${this.state} -> ${next}`);
    this.state = next;
  }

  /** Current matches for the configured command; no side effects. */
  async status(): Promise<ProcessMatch[]> {
    return findMatches(this.config.getCommand(), {
      processTable: this.processTable,
      matchMode: this.config.getMatchMode(),
      selfPid: this.deps.selfPid,
    });
  }

  /** Terminates every running watcher without starting a new one. */
  async stop(): Promise<ReapResult> {
    return reapAll(this.config.getCommand(), {
      processTable: this.processTable,
      matchMode: this.config.getMatchMode(),
      selfPid: this.deps.selfPid,
      pollIntervalMs: this.config.getPollIntervalMs(),
      maxAttempts: this.config.getMaxAttempts(),
      forceKillAfterAttempts: this.config.getForceKillAfterAttempts(),
      processKill: this.deps.processKill,
      sleep: this.deps.sleep,
    });
  }

  async run(): Promise<SupervisorRunResult> {
    if (this.state !== 'START') {
      throw new Error(`Supervisor already ran (state ${this.state})`);
    }

    const reaped = await this.stop();
    this.transition('CLEAN');

    await ensureLogFile(this.config.getLogFilePath());
    this.transition('READY');

    const launchImpl = this.deps.launch ?? launch;
    const handle = await launchImpl({
      command: this.config.getCommand(),
      logFilePath: this.config.getLogFilePath(),
      mirrorFilePath: this.config.getMirrorFilePath(),
      cwd: this.config.getServerDir(),
      processKill: this.deps.processKill,
    });
    this.transition('RUNNING');

    return { reaped, handle };
  }
}

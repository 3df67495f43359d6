/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { WatchCommand } from '../utils/command.js';
import { debugLogger } from '../utils/debugLogger.js';
import { StuckProcessError, getErrorMessage } from '../utils/errors.js';
import { findMatches, type FindOptions } from './processFinder.js';

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_MAX_ATTEMPTS = 15;

export interface ReapOptions extends FindOptions {
  pollIntervalMs?: number;
  /** Termination rounds allowed before giving up with StuckProcessError. */
  maxAttempts?: number;
  /** From this round on, SIGKILL is sent instead of SIGTERM. */
  forceKillAfterAttempts?: number;
  processKill?: (pid: number, signal: NodeJS.Signals) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface ReapResult {
  /** Number of termination rounds that were needed. */
  attempts: number;
  /** Every pid that was signalled, in order of first signal. */
  signalled: number[];
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Signals every process running `target` and rescans until none remain.
 * A failed signal is logged and ignored: the next scan decides.
 */
export async function reapAll(
  target: WatchCommand,
  options: ReapOptions,
): Promise<ReapResult> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const processKill =
    options.processKill ??
    ((pid: number, signal: NodeJS.Signals) => {
      process.kill(pid, signal);
    });
  const sleep = options.sleep ?? defaultSleep;

  const signalled: number[] = [];
  let attempts = 0;

  for (;;) {
    const matches = await findMatches(target, options);
    if (matches.length === 0) {
      return { attempts, signalled };
    }
    if (attempts >= maxAttempts) {
      throw new StuckProcessError(
        matches.map((match) => match.pid),
        attempts,
      );
    }

    attempts++;
    const signal: NodeJS.Signals =
      options.forceKillAfterAttempts !== undefined &&
      attempts >= options.forceKillAfterAttempts
        ? 'SIGKILL'
        : 'SIGTERM';

    for (const match of matches) {
      debugLogger.log(
        'Reaper',
        `Killing process ${match.pid} running: ${match.commandLine}`,
      );
      try {
        processKill(match.pid, signal);
      } catch (error) {
        debugLogger.warn(
          'Reaper',
          `Failed to send ${signal} to process ${match.pid}: ${getErrorMessage(error)}`,
        );
      }
      if (!signalled.includes(match.pid)) {
        signalled.push(match.pid);
      }
    }

    await sleep(pollIntervalMs);
  }
}

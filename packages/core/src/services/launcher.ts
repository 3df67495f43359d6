/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn, type ChildProcess } from 'node:child_process';
import * as fsPromises from 'node:fs/promises';
import { formatCommand, type WatchCommand } from '../utils/command.js';
import { debugLogger } from '../utils/debugLogger.js';
import { LaunchError, getErrorMessage } from '../utils/errors.js';
import {
  BackgroundProcessManager,
  type ProcessKill,
} from './backgroundProcessManager.js';

export interface LaunchOptions {
  command: WatchCommand;
  logFilePath: string;
  mirrorFilePath: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Used to roll back a partially started pipeline. */
  processKill?: ProcessKill;
}

export interface WatchProcessHandle {
  /** The watcher itself. */
  pid: number;
  tailPid: number;
  teePid: number;
  command: WatchCommand;
  commandLine: string;
  logFilePath: string;
  mirrorFilePath: string;
  startedAt: number;
}

/**
 * Creates the log file if it is missing. Opens in append mode, so existing
 * content is never truncated.
 */
export async function ensureLogFile(logFilePath: string): Promise<void> {
  try {
    const handle = await fsPromises.open(logFilePath, 'a');
    await handle.close();
  } catch (error) {
    throw new LaunchError(
      `Cannot create log file ${logFilePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

function waitForSpawn(child: ChildProcess, label: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      child.on('error', (error) => {
        debugLogger.warn('Launcher', `${label}: ${getErrorMessage(error)}`);
      });
      if (child.pid === undefined) {
        reject(new LaunchError(`Failed to start ${label}: no pid assigned`));
        return;
      }
      resolve(child.pid);
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(
        new LaunchError(`Failed to start ${label}: ${error.message}`, {
          cause: error,
        }),
      );
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Starts `tail -f -n +1 <log> | <command> 2>&1 | tee <mirror>` as detached
 * processes joined by OS pipes, and returns once all three are running. The
 * pipeline keeps running after this process exits.
 */
export async function launch(
  options: LaunchOptions,
): Promise<WatchProcessHandle> {
  const { command, logFilePath, mirrorFilePath, cwd } = options;
  const env = options.env ?? process.env;
  const commandLine = formatCommand(command);

  await ensureLogFile(logFilePath);

  if (command.scriptPath) {
    try {
      await fsPromises.access(command.scriptPath);
    } catch (error) {
      throw new LaunchError(
        `Watcher script not found: ${command.scriptPath}`,
        { cause: error },
      );
    }
  }

  const processes = new BackgroundProcessManager(options.processKill);

  try {
    const tail = spawn('tail', ['-f', '-n', '+1', logFilePath], {
      cwd,
      env,
      detached: true,
      stdio: ['ignore', 'pipe', 'inherit'],
    });
    const tailPid = await waitForSpawn(tail, 'tail');
    processes.register(tailPid);

    const tee = spawn('tee', [mirrorFilePath], {
      cwd,
      env,
      detached: true,
      stdio: ['pipe', 'inherit', 'inherit'],
    });
    const teePid = await waitForSpawn(tee, 'tee');
    processes.register(teePid);

    const tailOut = tail.stdout;
    const teeIn = tee.stdin;
    if (!tailOut || !teeIn) {
      throw new LaunchError('Pipeline streams are not available');
    }

    const watcher = spawn(command.executable, [...command.args], {
      cwd,
      env,
      detached: true,
      stdio: [tailOut, teeIn, teeIn],
    });
    const pid = await waitForSpawn(watcher, commandLine);
    processes.register(pid);

    // The children hold their own ends of both pipes.
    tailOut.destroy();
    teeIn.destroy();
    for (const child of [tail, tee, watcher]) {
      child.unref();
    }
    processes.release();

    debugLogger.log('Launcher', `started logwatch (pid ${pid})`);
    return {
      pid,
      tailPid,
      teePid,
      command,
      commandLine,
      logFilePath,
      mirrorFilePath,
      startedAt: Date.now(),
    };
  } catch (error) {
    const killed = processes.cleanup();
    if (killed.length > 0) {
      debugLogger.warn(
        'Launcher',
        `Stopped partially started pipeline: ${killed.join(', ')}`,
      );
    }
    if (error instanceof LaunchError) throw error;
    throw new LaunchError(
      `Failed to start ${commandLine}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

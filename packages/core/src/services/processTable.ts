/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import { spawnSync as nodeSpawnSync } from 'node:child_process';
import { debugLogger } from '../utils/debugLogger.js';
import {
  EnumerationError,
  getErrorMessage,
  isNodeError,
} from '../utils/errors.js';

export interface ProcessEntry {
  pid: number;
  /** 0 when the parent is unknown. */
  ppid: number;
  argv: string[];
  commandLine: string;
}

/**
 * A view of the processes visible to the current user. Implementations never
 * report the process they use to perform the scan.
 */
export interface ProcessTable {
  list(): Promise<ProcessEntry[]>;
}

/**
 * Reads argv of every process from `/proc/<pid>/cmdline` and its parent from
 * `/proc/<pid>/stat`.
 */
export class ProcfsProcessTable implements ProcessTable {
  constructor(private readonly procRoot = '/proc') {}

  async list(): Promise<ProcessEntry[]> {
    let names: string[];
    try {
      names = await fsPromises.readdir(this.procRoot);
    } catch (error) {
      throw new EnumerationError(
        `Cannot read process table at ${this.procRoot}: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    const entries: ProcessEntry[] = [];
    for (const name of names) {
      if (!/^\d+$/.test(name)) continue;
      const pid = Number(name);
      const cmdline = await this.readProcFile(pid, 'cmdline', 'command line');
      if (cmdline === null) continue;
      const argv = cmdline.split('\0');
      if (argv[argv.length - 1] === '') argv.pop();
      // Kernel threads have an empty cmdline.
      if (argv.length === 0) continue;
      const stat = await this.readProcFile(pid, 'stat', 'status');
      if (stat === null) continue;
      entries.push({
        pid,
        ppid: parseParentPid(stat),
        argv,
        commandLine: argv.join(' '),
      });
    }
    return entries;
  }

  private async readProcFile(
    pid: number,
    file: string,
    label: string,
  ): Promise<string | null> {
    try {
      return await fsPromises.readFile(
        path.join(this.procRoot, String(pid), file),
        'utf-8',
      );
    } catch (error) {
      // The process exited between readdir and readFile, or is not ours.
      if (
        isNodeError(error) &&
        (error.code === 'ENOENT' ||
          error.code === 'ESRCH' ||
          error.code === 'EACCES')
      ) {
        return null;
      }
      throw new EnumerationError(
        `Cannot read ${label} of process ${pid}: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

/**
 * `stat` reads `pid (comm) state ppid ...`; comm may itself contain spaces
 * and parentheses.
 */
function parseParentPid(stat: string): number {
  const fields = stat.slice(stat.lastIndexOf(')') + 1).trim().split(/\s+/);
  const ppid = Number(fields[1]);
  return Number.isInteger(ppid) && ppid > 0 ? ppid : 0;
}

/**
 * Parses the output of `ps -axo pid=,ppid=,args=`. Used where there is no procfs.
 */
export class PsProcessTable implements ProcessTable {
  private readonly spawnSyncImpl: typeof nodeSpawnSync;

  constructor(spawnSyncImpl?: typeof nodeSpawnSync) {
    this.spawnSyncImpl = spawnSyncImpl ?? nodeSpawnSync;
  }

  async list(): Promise<ProcessEntry[]> {
    const result = this.spawnSyncImpl('ps', ['-axo', 'pid=,ppid=,args='], {
      encoding: 'utf8',
    });
    if (result.error) {
      throw new EnumerationError(
        `Failed to run ps: ${getErrorMessage(result.error)}`,
        { cause: result.error },
      );
    }
    if (result.status !== 0) {
      throw new EnumerationError(
        `ps exited with status ${result.status}: ${String(result.stderr).trim()}`,
      );
    }

    const entries: ProcessEntry[] = [];
    for (const line of String(result.stdout).split('\n')) {
      const match = line.match(/^\s*(\d+)\s+(\d+)\s+(.*\S)\s*$/);
      if (!match) continue;
      const pid = Number(match[1]);
      if (pid === result.pid) continue;
      const commandLine = match[3];
      entries.push({
        pid,
        ppid: Number(match[2]),
        argv: commandLine.split(/\s+/),
        commandLine,
      });
    }
    return entries;
  }
}

class UnsupportedProcessTable implements ProcessTable {
  constructor(private readonly platform: NodeJS.Platform) {}

  async list(): Promise<ProcessEntry[]> {
    throw new EnumerationError(
      `Process enumeration is not supported on ${this.platform}`,
    );
  }
}

export function createProcessTable(
  platform: NodeJS.Platform = process.platform,
): ProcessTable {
  if (platform === 'win32') {
    return new UnsupportedProcessTable(platform);
  }
  if (fs.existsSync('/proc/self/cmdline')) {
    debugLogger.debug('ProcessTable', 'using procfs');
    return new ProcfsProcessTable();
  }
  debugLogger.debug('ProcessTable', 'using ps');
  return new PsProcessTable();
}

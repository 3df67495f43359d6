/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import type { spawnSync } from 'node:child_process';
import {
  ProcfsProcessTable,
  PsProcessTable,
  createProcessTable,
} from './processTable.js';
import { EnumerationError } from '../utils/errors.js';

vi.mock('node:fs/promises');

function spawnSyncReturning(result: {
  pid?: number;
  status?: number | null;
  stdout?: string;
  stderr?: string;
  error?: Error;
}): typeof spawnSync {
  return vi.fn().mockReturnValue({
    pid: result.pid ?? 999,
    status: result.status === undefined ? 0 : result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    output: [],
    signal: null,
    error: result.error,
  }) as unknown as typeof spawnSync;
}

describe('ProcfsProcessTable', () => {
  const procRoot = '/fake/proc';

  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should read argv from each numeric entry', async () => {
    vi.mocked(fsPromises.readdir).mockResolvedValue([
      '1',
      '42',
      'self',
      'cpuinfo',
    ] as unknown as Awaited<ReturnType<typeof fsPromises.readdir>>);
    vi.mocked(fsPromises.readFile).mockImplementation(async (file) => {
      if (file === path.join(procRoot, '1', 'cmdline')) {
        return '/sbin/init\0splash\0';
      }
      if (file === path.join(procRoot, '1', 'stat')) {
        return '1 (systemd) S 0 1 1 0 -1 4194560';
      }
      if (file === path.join(procRoot, '42', 'cmdline')) {
        return 'python3\0/srv/logwatch.py\0';
      }
      if (file === path.join(procRoot, '42', 'stat')) {
        return '42 (python3) S 7 42 7 0 -1 4194304';
      }
      throw new Error(`unexpected ${String(file)}`);
    });

    const entries = await new ProcfsProcessTable(procRoot).list();

    expect(entries).toEqual([
      {
        pid: 1,
        ppid: 0,
        argv: ['/sbin/init', 'splash'],
        commandLine: '/sbin/init splash',
      },
      {
        pid: 42,
        ppid: 7,
        argv: ['python3', '/srv/logwatch.py'],
        commandLine: 'python3 /srv/logwatch.py',
      },
    ]);
  });

  it('should skip kernel threads and processes that vanished', async () => {
    vi.mocked(fsPromises.readdir).mockResolvedValue([
      '2',
      '7',
      '8',
    ] as unknown as Awaited<ReturnType<typeof fsPromises.readdir>>);
    vi.mocked(fsPromises.readFile).mockImplementation(async (file) => {
      if (file === path.join(procRoot, '2', 'cmdline')) return '';
      if (file === path.join(procRoot, '7', 'cmdline')) {
        throw Object.assign(new Error('gone'), { code: 'ENOENT' });
      }
      if (file === path.join(procRoot, '8', 'stat')) {
        return '8 (tail) S 3 8 3 0 -1 4194304';
      }
      return 'tail\0-f\0';
    });

    const entries = await new ProcfsProcessTable(procRoot).list();

    expect(entries.map((entry) => entry.pid)).toEqual([8]);
  });

  it('should read the parent pid past a command name with spaces', async () => {
    vi.mocked(fsPromises.readdir).mockResolvedValue([
      '300',
    ] as unknown as Awaited<ReturnType<typeof fsPromises.readdir>>);
    vi.mocked(fsPromises.readFile).mockImplementation(async (file) => {
      if (file === path.join(procRoot, '300', 'stat')) {
        return '300 (tmux: server (1)) S 250 300 300 0 -1 4194560';
      }
      return 'tmux\0';
    });

    const entries = await new ProcfsProcessTable(procRoot).list();

    expect(entries).toEqual([
      { pid: 300, ppid: 250, argv: ['tmux'], commandLine: 'tmux' },
    ]);
  });

  it('should skip processes that exit before their status is read', async () => {
    vi.mocked(fsPromises.readdir).mockResolvedValue([
      '9',
    ] as unknown as Awaited<ReturnType<typeof fsPromises.readdir>>);
    vi.mocked(fsPromises.readFile).mockImplementation(async (file) => {
      if (file === path.join(procRoot, '9', 'stat')) {
        throw Object.assign(new Error('gone'), { code: 'ESRCH' });
      }
      return 'sleep\0infinity\0';
    });

    expect(await new ProcfsProcessTable(procRoot).list()).toEqual([]);
  });

  it('should fail with EnumerationError when the table is unreadable', async () => {
    vi.mocked(fsPromises.readdir).mockRejectedValue(
      Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }),
    );

    await expect(new ProcfsProcessTable(procRoot).list()).rejects.toThrow(
      EnumerationError,
    );
  });

  it('should fail with EnumerationError on unexpected read errors', async () => {
    vi.mocked(fsPromises.readdir).mockResolvedValue([
      '5',
    ] as unknown as Awaited<ReturnType<typeof fsPromises.readdir>>);
    vi.mocked(fsPromises.readFile).mockRejectedValue(
      Object.assign(new Error('I/O error'), { code: 'EIO' }),
    );

    await expect(new ProcfsProcessTable(procRoot).list()).rejects.toThrow(
      'Cannot read command line of process 5: I/O error',
    );
  });
});

describe('PsProcessTable', () => {
  it('should parse ps rows and omit the ps process itself', async () => {
    const spawnSyncImpl = spawnSyncReturning({
      pid: 555,
      stdout: [
        '    1     0 /sbin/init',
        '  100     1 python3 /srv/logwatch.py',
        '  555   554 ps -axo pid=,ppid=,args=',
        '',
      ].join('\n'),
    });

    const entries = await new PsProcessTable(spawnSyncImpl).list();

    expect(spawnSyncImpl).toHaveBeenCalledWith('ps', ['-axo', 'pid=,ppid=,args='], {
      encoding: 'utf8',
    });
    expect(entries).toEqual([
      { pid: 1, ppid: 0, argv: ['/sbin/init'], commandLine: '/sbin/init' },
      {
        pid: 100,
        ppid: 1,
        argv: ['python3', '/srv/logwatch.py'],
        commandLine: 'python3 /srv/logwatch.py',
      },
    ]);
  });

  it('should fail with EnumerationError when ps cannot run', async () => {
    const table = new PsProcessTable(
      spawnSyncReturning({ status: null, error: new Error('spawn ps ENOENT') }),
    );

    await expect(table.list()).rejects.toThrow(
      'Failed to run ps: spawn ps ENOENT',
    );
  });

  it('should fail with EnumerationError when ps exits non-zero', async () => {
    const table = new PsProcessTable(
      spawnSyncReturning({ status: 1, stderr: 'ps: illegal option\n' }),
    );

    await expect(table.list()).rejects.toThrow(
      'ps exited with status 1: ps: illegal option',
    );
  });
});

describe('createProcessTable', () => {
  it('should refuse to enumerate on Windows', async () => {
    await expect(createProcessTable('win32').list()).rejects.toThrow(
      'Process enumeration is not supported on win32',
    );
  });
});

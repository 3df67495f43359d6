/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  LaunchError,
  WatchSupervisor,
  debugLogger,
  type SupervisorConfig,
} from '@logwatch-keeper/core';
import { main } from './cli.js';
import { loadSettings } from './config/settings.js';

vi.mock('@logwatch-keeper/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@logwatch-keeper/core')>();
  return { ...actual, WatchSupervisor: vi.fn() };
});
vi.mock('./config/settings.js');

describe('main', () => {
  const run = vi.fn();
  const stop = vi.fn();
  const status = vi.fn();
  let configs: SupervisorConfig[];

  const cli = (...args: string[]) => main(['node', 'logwatch-keeper', ...args]);

  beforeEach(() => {
    vi.resetAllMocks();
    configs = [];
    vi.stubEnv('SERVER_DIR', '');
    vi.stubEnv('WATCH_CMD', '');
    vi.mocked(loadSettings).mockReturnValue({});
    vi.mocked(WatchSupervisor).mockImplementation(function (
      config: SupervisorConfig,
    ) {
      configs.push(config);
      return { run, stop, status } as unknown as WatchSupervisor;
    });
    run.mockResolvedValue({
      reaped: { attempts: 0, signalled: [] },
      handle: { pid: 300, tailPid: 301, teePid: 302 },
    });
    vi.spyOn(debugLogger, 'log').mockImplementation(() => {});
    vi.spyOn(debugLogger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should restart the watcher by default', async () => {
    expect(await cli('--server-dir', '/srv')).toBe(0);

    expect(run).toHaveBeenCalledTimes(1);
    expect(configs[0].getCommandLine()).toBe('python3 /srv/logwatch.py');
    expect(configs[0].getLogFilePath()).toBe('/srv/infer.log');
  });

  it('should pass options through to the supervisor config', async () => {
    expect(
      await cli(
        'restart',
        '--server-dir',
        '/srv',
        '--script',
        'logwatch_ooba.py',
        '--poll-interval',
        '250',
        '--match',
        'substring',
      ),
    ).toBe(0);

    expect(configs[0].getCommandLine()).toBe('python3 /srv/logwatch_ooba.py');
    expect(configs[0].getPollIntervalMs()).toBe(250);
    expect(configs[0].getMatchMode()).toBe('substring');
  });

  it('should list running watchers', async () => {
    status.mockResolvedValue([
      { pid: 100, commandLine: 'python3 /srv/logwatch.py' },
      { pid: 101, commandLine: 'python3 /srv/logwatch.py' },
    ]);

    expect(await cli('status', '--server-dir', '/srv')).toBe(0);

    expect(debugLogger.log).toHaveBeenCalledWith(
      '100  python3 /srv/logwatch.py',
    );
    expect(debugLogger.log).toHaveBeenCalledWith(
      '101  python3 /srv/logwatch.py',
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('should say when no watcher runs', async () => {
    status.mockResolvedValue([]);

    expect(await cli('status')).toBe(0);
    expect(debugLogger.log).toHaveBeenCalledWith('no watcher running');
  });

  it('should stop watchers without restarting', async () => {
    stop.mockResolvedValue({ attempts: 1, signalled: [100] });

    expect(await cli('stop')).toBe(0);

    expect(debugLogger.log).toHaveBeenCalledWith('stopped 1 watcher(s)');
    expect(run).not.toHaveBeenCalled();
  });

  it('should exit with the error code of a supervisor failure', async () => {
    run.mockRejectedValue(
      new LaunchError('Watcher script not found: /srv/logwatch.py'),
    );

    expect(await cli('--server-dir', '/srv')).toBe(5);
    expect(debugLogger.error).toHaveBeenCalledWith(
      'Watcher script not found: /srv/logwatch.py',
    );
  });

  it('should exit with 2 on invalid configuration', async () => {
    expect(await cli('--max-attempts', '0')).toBe(2);
    expect(run).not.toHaveBeenCalled();
  });

  it('should exit with 2 on unknown options', async () => {
    expect(await cli('--bogus')).toBe(2);
    expect(WatchSupervisor).not.toHaveBeenCalled();
  });

  it('should exit with 1 on unexpected errors', async () => {
    const failure = new Error('disk on fire');
    run.mockRejectedValue(failure);

    expect(await cli()).toBe(1);
    expect(debugLogger.error).toHaveBeenCalledWith(
      'Unexpected error:',
      failure,
    );
  });
});

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import type { Options } from 'yargs';
import { z } from 'zod';
import {
  ConfigError,
  SupervisorConfig,
  formatZodIssues,
} from '@logwatch-keeper/core';
import { loadSettings, type RawSettings } from './settings.js';

export const supervisorOptions = {
  'server-dir': {
    type: 'string',
    description:
      'Directory holding the watcher script and log files (default: $SERVER_DIR or cwd)',
  },
  interpreter: {
    type: 'string',
    description: 'Interpreter that runs the watcher script (default: python3)',
  },
  script: {
    type: 'string',
    description: 'Watcher script, relative to the server directory',
  },
  command: {
    type: 'string',
    description: 'Full watcher command; overrides --interpreter and --script',
  },
  'log-file': {
    type: 'string',
    description: 'Log file fed to the watcher (default: infer.log)',
  },
  'mirror-file': {
    type: 'string',
    description: 'File receiving a copy of the watcher output (default: watch.log)',
  },
  'poll-interval': {
    type: 'number',
    description: 'Milliseconds to wait between termination rounds',
  },
  'max-attempts': {
    type: 'number',
    description: 'Termination rounds before giving up',
  },
  'force-after': {
    type: 'number',
    description: 'Round from which SIGKILL replaces SIGTERM',
  },
  match: {
    type: 'string',
    choices: ['exact', 'substring'],
    description: 'How running processes are matched against the command',
  },
  debug: {
    type: 'boolean',
    default: false,
    description: 'Enable debug logging',
  },
} satisfies Record<string, Options>;

const cliArgsSchema = z.object({
  'server-dir': z.string().optional(),
  interpreter: z.string().optional(),
  script: z.string().optional(),
  command: z.string().optional(),
  'log-file': z.string().optional(),
  'mirror-file': z.string().optional(),
  'poll-interval': z.number().optional(),
  'max-attempts': z.number().optional(),
  'force-after': z.number().optional(),
  match: z.string().optional(),
  debug: z.boolean().optional(),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

export function parseCliArgs(argv: unknown): CliArgs {
  const parsed = cliArgsSchema.safeParse(argv);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid arguments: ${formatZodIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

function withoutEmpty(settings: RawSettings): RawSettings {
  return Object.fromEntries(
    Object.entries(settings).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
}

const ENV_KEYS: Record<string, string> = {
  SERVER_DIR: 'serverDir',
  WATCH_INTERPRETER: 'interpreter',
  WATCH_SCRIPT: 'watcherScript',
  WATCH_CMD: 'command',
  WATCH_LOG_FILE: 'logFile',
  WATCH_MIRROR_FILE: 'mirrorFile',
  WATCH_POLL_INTERVAL_MS: 'pollIntervalMs',
  WATCH_MAX_ATTEMPTS: 'maxAttempts',
  WATCH_FORCE_AFTER: 'forceKillAfterAttempts',
  WATCH_MATCH_MODE: 'matchMode',
};

export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const settings: RawSettings = {};
  for (const [envKey, settingKey] of Object.entries(ENV_KEYS)) {
    settings[settingKey] = env[envKey];
  }
  return withoutEmpty(settings);
}

export function settingsFromArgs(args: CliArgs): RawSettings {
  return withoutEmpty({
    serverDir: args['server-dir'],
    interpreter: args.interpreter,
    watcherScript: args.script,
    command: args.command,
    logFile: args['log-file'],
    mirrorFile: args['mirror-file'],
    pollIntervalMs: args['poll-interval'],
    maxAttempts: args['max-attempts'],
    forceKillAfterAttempts: args['force-after'],
    matchMode: args.match,
  });
}

const COMMAND_KEYS = ['command', 'interpreter', 'watcherScript'];

/**
 * The watcher command is taken whole from the highest layer that sets any
 * part of it, so a lower `command` cannot shadow a higher `--script`.
 */
export function resolveCommandLayer(layers: RawSettings[]): RawSettings[] {
  const winner = [...layers]
    .reverse()
    .find((layer) => COMMAND_KEYS.some((key) => key in layer));
  return layers.map((layer) =>
    layer === winner
      ? layer
      : Object.fromEntries(
          Object.entries(layer).filter(([key]) => !COMMAND_KEYS.includes(key)),
        ),
  );
}

/**
 * Resolves the supervisor configuration. Flags win over the environment,
 * which wins over `<serverDir>/logwatch.json`.
 */
export function loadCliConfig(
  args: CliArgs,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SupervisorConfig {
  const fromArgs = settingsFromArgs(args);
  const fromEnv = settingsFromEnv(env);
  const serverDirSetting = fromArgs['serverDir'] ?? fromEnv['serverDir'] ?? '.';
  if (typeof serverDirSetting !== 'string') {
    throw new ConfigError('Server directory must be a path');
  }
  const serverDir = path.resolve(cwd, serverDirSetting);
  const merged = resolveCommandLayer([
    loadSettings(serverDir),
    fromEnv,
    fromArgs,
  ]).reduce<RawSettings>((acc, layer) => ({ ...acc, ...layer }), {});

  return SupervisorConfig.fromSettings({ ...merged, serverDir }, cwd);
}

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { z } from 'zod';
import {
  formatCommand,
  parseCommand,
  type WatchCommand,
} from '../utils/command.js';
import { ConfigError } from '../utils/errors.js';
import type { MatchMode } from '../services/processFinder.js';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_MS,
} from '../services/reaper.js';

export const DEFAULT_INTERPRETER = 'python3';
export const DEFAULT_WATCHER_SCRIPT = 'logwatch.py';
export const DEFAULT_LOG_FILE = 'infer.log';
export const DEFAULT_MIRROR_FILE = 'watch.log';

const positiveInt = z.coerce.number().int().positive();

export const supervisorSettingsSchema = z
  .object({
    serverDir: z.string().min(1).optional(),
    interpreter: z.string().trim().min(1).optional(),
    watcherScript: z.string().min(1).optional(),
    command: z.string().trim().min(1).optional(),
    logFile: z.string().min(1).optional(),
    mirrorFile: z.string().min(1).optional(),
    pollIntervalMs: positiveInt.optional(),
    maxAttempts: positiveInt.optional(),
    forceKillAfterAttempts: positiveInt.optional(),
    matchMode: z.enum(['exact', 'substring']).optional(),
  })
  .strict();

export type SupervisorSettings = z.input<typeof supervisorSettingsSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

export interface SupervisorConfigParameters {
  serverDir: string;
  command: WatchCommand;
  logFilePath: string;
  mirrorFilePath: string;
  pollIntervalMs: number;
  maxAttempts: number;
  forceKillAfterAttempts?: number;
  matchMode: MatchMode;
}

export class SupervisorConfig {
  private readonly serverDir: string;
  private readonly command: WatchCommand;
  private readonly logFilePath: string;
  private readonly mirrorFilePath: string;
  private readonly pollIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly forceKillAfterAttempts: number | undefined;
  private readonly matchMode: MatchMode;

  constructor(params: SupervisorConfigParameters) {
    this.serverDir = params.serverDir;
    this.command = params.command;
    this.logFilePath = params.logFilePath;
    this.mirrorFilePath = params.mirrorFilePath;
    this.pollIntervalMs = params.pollIntervalMs;
    this.maxAttempts = params.maxAttempts;
    this.forceKillAfterAttempts = params.forceKillAfterAttempts;
    this.matchMode = params.matchMode;
  }

  /**
   * Validates merged settings and resolves every path against the server
   * directory, which itself defaults to `cwd`.
   */
  static fromSettings(settings: unknown, cwd: string): SupervisorConfig {
    const parsed = supervisorSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid configuration: ${formatZodIssues(parsed.error)}`,
      );
    }
    const s = parsed.data;
    const serverDir = path.resolve(cwd, s.serverDir ?? '.');

    let command: WatchCommand;
    if (s.command) {
      command = parseCommand(s.command);
    } else {
      const interpreter = parseCommand(s.interpreter ?? DEFAULT_INTERPRETER);
      const scriptPath = path.resolve(
        serverDir,
        s.watcherScript ?? DEFAULT_WATCHER_SCRIPT,
      );
      command = Object.freeze({
        executable: interpreter.executable,
        args: Object.freeze([...interpreter.args, scriptPath]),
        scriptPath,
      });
    }

    const maxAttempts = s.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (
      s.forceKillAfterAttempts !== undefined &&
      s.forceKillAfterAttempts > maxAttempts
    ) {
      throw new ConfigError(
        `forceKillAfterAttempts (${s.forceKillAfterAttempts}) exceeds maxAttempts (${maxAttempts})`,
      );
    }

    return new SupervisorConfig({
      serverDir,
      command,
      logFilePath: path.resolve(serverDir, s.logFile ?? DEFAULT_LOG_FILE),
      mirrorFilePath: path.resolve(
        serverDir,
        s.mirrorFile ?? DEFAULT_MIRROR_FILE,
      ),
      pollIntervalMs: s.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      maxAttempts,
      forceKillAfterAttempts: s.forceKillAfterAttempts,
      matchMode: s.matchMode ?? 'exact',
    });
  }

  getServerDir(): string {
    return this.serverDir;
  }

  getCommand(): WatchCommand {
    return this.command;
  }

  getCommandLine(): string {
    return formatCommand(this.command);
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  getMirrorFilePath(): string {
    return this.mirrorFilePath;
  }

  getPollIntervalMs(): number {
    return this.pollIntervalMs;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  getForceKillAfterAttempts(): number | undefined {
    return this.forceKillAfterAttempts;
  }

  getMatchMode(): MatchMode {
    return this.matchMode;
  }
}

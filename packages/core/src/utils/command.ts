/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigError } from './errors.js';

/**
 * The command used both to find running watchers and to start a new one.
 */
export interface WatchCommand {
  readonly executable: string;
  readonly args: readonly string[];
  /** Script the interpreter runs; checked for existence before launch. */
  readonly scriptPath?: string;
}

/**
 * Splits a command string on whitespace. Quoting is not interpreted.
 */
export function parseCommand(text: string, scriptPath?: string): WatchCommand {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  const [executable, ...args] = parts;
  if (!executable) {
    throw new ConfigError('Watcher command must not be empty');
  }
  return Object.freeze({ executable, args: Object.freeze(args), scriptPath });
}

export function formatCommand(command: WatchCommand): string {
  return [command.executable, ...command.args].join(' ');
}

export function commandArgv(command: WatchCommand): string[] {
  return [command.executable, ...command.args];
}

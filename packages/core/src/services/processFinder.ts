/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  commandArgv,
  formatCommand,
  parseCommand,
  type WatchCommand,
} from '../utils/command.js';
import type { ProcessEntry, ProcessTable } from './processTable.js';

export type MatchMode = 'exact' | 'substring';

export interface ProcessMatch {
  pid: number;
  commandLine: string;
}

export interface FindOptions {
  processTable: ProcessTable;
  matchMode?: MatchMode;
  /** Defaults to the current process. Its ancestors are never matched. */
  selfPid?: number;
}

function argvEquals(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export function matchesCommand(
  entry: ProcessEntry,
  target: WatchCommand,
  mode: MatchMode,
): boolean {
  if (mode === 'substring') {
    return entry.commandLine.includes(formatCommand(target));
  }
  return argvEquals(entry.argv, commandArgv(target));
}

/** `pid` and every ancestor of it found in `entries`. */
export function lineageOf(pid: number, entries: ProcessEntry[]): Set<number> {
  const parents = new Map<number, number>(
    entries.map((entry) => [entry.pid, entry.ppid]),
  );
  const lineage = new Set<number>([pid]);
  let parent = parents.get(pid);
  while (parent !== undefined && parent > 0 && !lineage.has(parent)) {
    lineage.add(parent);
    parent = parents.get(parent);
  }
  return lineage;
}

/**
 * Returns every visible process running `target`, excluding this process and
 * the processes that started it (a `tsx` runner or wrapping shell whose
 * arguments contain the command).
 * Rejects with an EnumerationError when the table cannot be read.
 */
export async function findMatches(
  target: WatchCommand | string,
  options: FindOptions,
): Promise<ProcessMatch[]> {
  const command = typeof target === 'string' ? parseCommand(target) : target;
  const mode = options.matchMode ?? 'exact';
  const selfPid = options.selfPid ?? process.pid;
  const entries = await options.processTable.list();
  const lineage = lineageOf(selfPid, entries);
  return entries
    .filter((entry) => !lineage.has(entry.pid))
    .filter((entry) => matchesCommand(entry, command, mode))
    .map((entry) => ({ pid: entry.pid, commandLine: entry.commandLine }));
}

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as util from 'node:util';

type LogLevel = 'LOG' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * Process-wide logger. Writes to the console and, when
 * `LOGWATCH_DEBUG_LOG_FILE` is set, appends every line to that file as well.
 */
export class DebugLogger {
  private logStream: fs.WriteStream | undefined;
  private debugEnabled: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.debugEnabled = env['LOGWATCH_DEBUG'] === '1';
    const logFile = env['LOGWATCH_DEBUG_LOG_FILE'];
    if (logFile) {
      this.logStream = fs.createWriteStream(logFile, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.error('Error writing to debug log stream:', error);
        this.logStream = undefined;
      });
    }
  }

  setDebugEnabled(enabled: boolean) {
    this.debugEnabled = enabled;
  }

  private writeToFile(level: LogLevel, args: unknown[]) {
    if (!this.logStream) return;
    const line = `[${new Date().toISOString()}] [${level}] ${util.format(...args)}\n`;
    this.logStream.write(line);
  }

  log(...args: unknown[]): void {
    this.writeToFile('LOG', args);
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('WARN', args);
    console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('ERROR', args);
    console.error(...args);
  }

  debug(...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.writeToFile('DEBUG', args);
    console.debug(...args);
  }
}

export const debugLogger = new DebugLogger();

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * Base class for every failure that should end a supervisor invocation with a
 * specific exit code.
 */
export class SupervisorError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, options);
  }
}

/** The process table could not be read. */
export class EnumerationError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 3, options);
  }
}

/** Matching processes survived every termination round. */
export class StuckProcessError extends SupervisorError {
  constructor(
    readonly pids: number[],
    readonly attempts: number,
  ) {
    super(
      `Process(es) ${pids.join(', ')} still running after ${attempts} termination attempt(s)`,
      4,
    );
  }
}

export class LaunchError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 5, options);
  }
}

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  ConfigError,
  debugLogger,
  formatZodIssues,
  getErrorMessage,
  supervisorSettingsSchema,
} from '@logwatch-keeper/core';

export const SETTINGS_FILE_NAME = 'logwatch.json';

// The file lives in the server directory, so it cannot move it.
const fileSettingsSchema = supervisorSettingsSchema.omit({ serverDir: true });

export type RawSettings = Record<string, unknown>;

/**
 * Reads `<serverDir>/logwatch.json`. A missing file yields no settings.
 */
export function loadSettings(serverDir: string): RawSettings {
  const filePath = path.join(serverDir, SETTINGS_FILE_NAME);
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read settings file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const parsed = fileSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid settings in ${filePath}: ${formatZodIssues(parsed.error)}`,
    );
  }
  debugLogger.debug('Settings', `loaded ${filePath}`);
  return parsed.data;
}

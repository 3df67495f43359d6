/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config/config.js';
export * from './utils/command.js';
export * from './utils/debugLogger.js';
export * from './utils/errors.js';
export * from './services/backgroundProcessManager.js';
export * from './services/processTable.js';
export * from './services/processFinder.js';
export * from './services/reaper.js';
export * from './services/launcher.js';
export * from './services/supervisor.js';

#!/usr/bin/env tsx
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './cli.js';

process.exitCode = await main(process.argv);

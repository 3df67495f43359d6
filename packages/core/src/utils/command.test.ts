/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { commandArgv, formatCommand, parseCommand } from './command.js';
import { ConfigError } from './errors.js';

describe('parseCommand', () => {
  it('should split on runs of whitespace', () => {
    const command = parseCommand('  python3   /srv/logwatch.py  --quiet ');
    expect(command.executable).toBe('python3');
    expect(command.args).toEqual(['/srv/logwatch.py', '--quiet']);
    expect(command.scriptPath).toBeUndefined();
  });

  it('should keep the script path when given', () => {
    const command = parseCommand('python3 /srv/w.py', '/srv/w.py');
    expect(command.scriptPath).toBe('/srv/w.py');
  });

  it('should reject an empty command', () => {
    expect(() => parseCommand('   ')).toThrow(ConfigError);
  });

  it('should format back to a single-spaced command line', () => {
    const command = parseCommand('python3\t/srv/w.py');
    expect(formatCommand(command)).toBe('python3 /srv/w.py');
    expect(commandArgv(command)).toEqual(['python3', '/srv/w.py']);
  });
});

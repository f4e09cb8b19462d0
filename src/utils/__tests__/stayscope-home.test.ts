import { describe, it, expect, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { getStayscopeHome, getStayscopePath } from '../stayscope-home.js';

describe('stayscope home', () => {
  const configured = process.env.STAYSCOPE_HOME;

  afterEach(() => {
    if (configured === undefined) {
      delete process.env.STAYSCOPE_HOME;
    } else {
      process.env.STAYSCOPE_HOME = configured;
    }
  });

  it('should use STAYSCOPE_HOME when set', () => {
    process.env.STAYSCOPE_HOME = join('tmp', 'stayscope-home');

    expect(getStayscopePath('logs', 'debug.log')).toBe(join('tmp', 'stayscope-home', 'logs', 'debug.log'));
  });

  it('should fall back to ~/.stayscope when unset or empty', () => {
    process.env.STAYSCOPE_HOME = '';

    expect(getStayscopeHome()).toBe(join(homedir(), '.stayscope'));
  });
});

/**
 * Unit Tests for ProcessEnvironment and StaticEnvironment
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ProcessEnvironment,
  StaticEnvironment,
} from '../../../../src/config/sources/providers/ProcessEnvironment.js';

describe('ProcessEnvironment', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    // Save original environment
    originalEnv = { ...process.env };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should read from process.env by default', () => {
    process.env.PRIVX_TEST_VALUE = 'from-process';

    expect(new ProcessEnvironment().lookup('PRIVX_TEST_VALUE')).toBe('from-process');
  });

  it('should return undefined for unset variables', () => {
    delete process.env.PRIVX_TEST_UNSET;

    expect(new ProcessEnvironment().lookup('PRIVX_TEST_UNSET')).toBeUndefined();
  });

  it('should return the empty string for variables set to ""', () => {
    expect(new ProcessEnvironment({ EMPTY: '' }).lookup('EMPTY')).toBe('');
  });

  it('should not trim values', () => {
    expect(new ProcessEnvironment({ PADDED: '  value  ' }).lookup('PADDED')).toBe('  value  ');
  });
});

describe('StaticEnvironment', () => {
  it('should serve the given values', () => {
    const env = new StaticEnvironment({ A: '1' });

    expect(env.lookup('A')).toBe('1');
    expect(env.lookup('B')).toBeUndefined();
  });
});

/**
 * Tests for the command context factory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createContext } from '../context.js';

// chalk may color under the test runner
const plain = (value: unknown) => String(value).replace(/\u001b\[[0-9;]*m/g, '');

describe('createContext', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs and warns in text mode', () => {
    const ctx = createContext({ verbose: false, json: false });

    ctx.log('hello');
    ctx.warn('careful');

    expect(logSpy).toHaveBeenCalledWith('hello');
    expect(plain(warnSpy.mock.calls[0][0])).toBe('Warning: careful');
  });

  it('prints debug lines only with --verbose', () => {
    createContext({ verbose: false, json: false }).debug('hidden');
    expect(logSpy).not.toHaveBeenCalled();

    createContext({ verbose: true, json: false }).debug('shown');
    expect(plain(logSpy.mock.calls[0][0])).toBe('[debug] shown');
  });

  it('keeps stdout clean with --json and prints errors as JSON', () => {
    const ctx = createContext({ verbose: true, json: true });

    ctx.log('hello');
    ctx.debug('detail');
    ctx.warn('careful');
    ctx.error('broken');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(JSON.stringify({ error: 'broken' }));
  });

  it('prefixes errors in text mode', () => {
    createContext({ verbose: false, json: false }).error('broken');

    expect(plain(errorSpy.mock.calls[0][0])).toBe('Error: broken');
  });
});

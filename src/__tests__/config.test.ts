import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { resolveShareConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('resolveShareConfig', () => {
  it('should fill every default', () => {
    const config = resolveShareConfig();

    expect(config).toEqual({
      syncIntervalMs: 2000,
      configDir: join(homedir(), '.lanshare'),
      downloadDir: join(homedir(), 'Downloads', 'lanshare'),
      alias: undefined,
      deviceModel: undefined,
      deviceType: 'desktop',
      topic: 'lanshare',
      acceptIncoming: true,
      transferTimeoutMs: 300_000,
      verbose: false,
    });
  });

  it('should keep explicit values, including falsy ones', () => {
    const config = resolveShareConfig({
      syncIntervalMs: 500,
      alias: 'Kitchen Laptop',
      deviceType: 'headless',
      topic: 'office',
      acceptIncoming: false,
      verbose: true,
    });

    expect(config.syncIntervalMs).toBe(500);
    expect(config.alias).toBe('Kitchen Laptop');
    expect(config.deviceType).toBe('headless');
    expect(config.topic).toBe('office');
    expect(config.acceptIncoming).toBe(false);
    expect(config.verbose).toBe(true);
  });

  it('should reject a non-positive sync interval', () => {
    expect(() => resolveShareConfig({ syncIntervalMs: -1 })).toThrow(ConfigError);
    expect(() => resolveShareConfig({ syncIntervalMs: -1 })).toThrow(
      'syncIntervalMs must be a positive number, got -1'
    );
  });

  it('should reject a non-finite transfer timeout', () => {
    expect(() => resolveShareConfig({ transferTimeoutMs: Number.NaN })).toThrow(
      'transferTimeoutMs must be a positive number, got NaN'
    );
  });

  it('should reject a blank topic', () => {
    expect(() => resolveShareConfig({ topic: '   ' })).toThrow('topic must not be empty');
  });

  it('should reject a blank alias', () => {
    expect(() => resolveShareConfig({ alias: '' })).toThrow('alias must not be empty');
  });

  it('should carry the INVALID_CONFIG code', () => {
    try {
      resolveShareConfig({ topic: '' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('INVALID_CONFIG');
        expect(err.recoverable).toBe(false);
        expect(err.toString()).toBe('[INVALID_CONFIG] topic must not be empty');
      }
    }
  });
});

/**
 * Configuration resolution
 */

import { homedir } from 'os';
import { join } from 'path';
import { ConfigError } from './errors.js';
import { DEFAULT_SHARE_CONFIG, DEVICE_TYPES, type DeviceType, type ShareConfig } from './types.js';

function isDeviceType(value: string): value is DeviceType {
  return DEVICE_TYPES.some((type) => type === value);
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Merge options over the defaults and validate the result.
 * Throws ConfigError on the first invalid field.
 */
export function resolveShareConfig(options: Partial<ShareConfig> = {}): ShareConfig {
  const config: ShareConfig = {
    syncIntervalMs: options.syncIntervalMs ?? DEFAULT_SHARE_CONFIG.syncIntervalMs,
    configDir: options.configDir ?? join(homedir(), '.lanshare'),
    downloadDir: options.downloadDir ?? join(homedir(), 'Downloads', 'lanshare'),
    alias: options.alias,
    deviceModel: options.deviceModel,
    deviceType: options.deviceType ?? DEFAULT_SHARE_CONFIG.deviceType,
    topic: options.topic ?? DEFAULT_SHARE_CONFIG.topic,
    acceptIncoming: options.acceptIncoming ?? DEFAULT_SHARE_CONFIG.acceptIncoming,
    transferTimeoutMs: options.transferTimeoutMs ?? DEFAULT_SHARE_CONFIG.transferTimeoutMs,
    verbose: options.verbose ?? DEFAULT_SHARE_CONFIG.verbose,
  };

  requirePositive('syncIntervalMs', config.syncIntervalMs);
  requirePositive('transferTimeoutMs', config.transferTimeoutMs);

  if (config.topic.trim().length === 0) {
    throw new ConfigError('topic must not be empty');
  }
  if (!isDeviceType(config.deviceType)) {
    throw new ConfigError(
      `deviceType must be one of ${DEVICE_TYPES.join(', ')}, got ${String(config.deviceType)}`
    );
  }
  if (config.alias !== undefined && config.alias.trim().length === 0) {
    throw new ConfigError('alias must not be empty');
  }

  return config;
}

/**
 * Service configuration
 *
 * Environment-driven, parsed once with typed defaults. An invalid value is
 * logged and replaced by its default.
 */

import { DbDriver, WarehouseConfig } from './config.types';
import {
  EnvSource,
  parseBoolean,
  parseEnum,
  parsePort,
  parsePositiveInt,
  parseString,
} from './config.utils';
import { logger } from './logger';

const DB_DRIVERS: readonly [DbDriver, ...DbDriver[]] = ['memory', 'postgres'];

export function loadConfig(env: EnvSource = process.env): WarehouseConfig {
  return Object.freeze({
    // HTTP
    PORT: parsePort(env, 'PORT', 3000),
    BACKEND_TIMEOUT_MS: parsePositiveInt(env, 'BACKEND_TIMEOUT_MS', 25000), // 25 seconds

    // Service identity
    SERVICE_VERSION: parseString(env, 'SERVICE_VERSION', '0.0.0'),
    ENVIRONMENT: parseString(env, 'NODE_ENV', 'development'),

    // Logging
    LOG_LEVEL: parseString(env, 'LOG_LEVEL', 'info'),

    // Store
    DB_DRIVER: parseEnum(env, 'DB_DRIVER', 'memory', DB_DRIVERS),
    DB_HOST: parseString(env, 'DB_HOST', ''),
    DB_PORT: parsePort(env, 'DB_PORT', 5432),
    DB_USER: parseString(env, 'DB_USER', ''),
    DB_PASSWORD: parseString(env, 'DB_PASSWORD', ''),
    DB_NAME: parseString(env, 'DB_NAME', ''),
    DB_POOL_MAX: parsePositiveInt(env, 'DB_POOL_MAX', 10),
    DB_CONNECT_TIMEOUT_MS: parsePositiveInt(env, 'DB_CONNECT_TIMEOUT_MS', 5000),
    DB_MIGRATE: parseBoolean(env, 'DB_MIGRATE', true),
  });
}

export const config: WarehouseConfig = loadConfig();

/**
 * List configuration problems; an empty list means the config is usable
 */
export function validateConfig(cfg: WarehouseConfig = config): string[] {
  const issues: string[] = [];

  if (cfg.DB_DRIVER === 'postgres') {
    const required: Array<keyof WarehouseConfig> = ['DB_HOST', 'DB_USER', 'DB_NAME'];
    for (const key of required) {
      if (cfg[key] === '') {
        issues.push(`${key} is required when DB_DRIVER is postgres`);
      }
    }
  }

  if (cfg.BACKEND_TIMEOUT_MS < cfg.DB_CONNECT_TIMEOUT_MS) {
    issues.push('BACKEND_TIMEOUT_MS must not be shorter than DB_CONNECT_TIMEOUT_MS');
  }

  if (issues.length > 0) {
    logger.error({ issues }, 'Configuration validation failed');
  }

  return issues;
}

/**
 * Get configuration summary for logging; never includes the password
 */
export function getConfigSummary(cfg: WarehouseConfig = config): Record<string, unknown> {
  return {
    port: cfg.PORT,
    backendTimeoutMs: cfg.BACKEND_TIMEOUT_MS,
    release: cfg.SERVICE_VERSION,
    environment: cfg.ENVIRONMENT,
    logLevel: cfg.LOG_LEVEL,
    store: {
      driver: cfg.DB_DRIVER,
      host: cfg.DB_HOST,
      port: cfg.DB_PORT,
      database: cfg.DB_NAME,
      poolMax: cfg.DB_POOL_MAX,
      migrate: cfg.DB_MIGRATE,
    },
  };
}

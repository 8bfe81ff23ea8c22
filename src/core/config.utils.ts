import { z } from 'zod';
import { logger } from './logger';

// Utility functions for configuration parsing

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse environment variable with type conversion
 */
export function parseEnvVar<T>(
  env: EnvSource,
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    logger.warn({ key, value, defaultValue, error }, `Invalid value for ${key}, using default`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`Invalid integer: ${value}`);
  }
  const parsed = parseInt(value, 10);

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

export function parsePositiveInt(env: EnvSource, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

export function parsePort(env: EnvSource, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 1, 65535)
  );
}

export function parseBoolean(env: EnvSource, key: string, defaultValue: boolean): boolean {
  return parseEnvVar(env, key, defaultValue, (value) => {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    throw new Error(`Invalid boolean: ${value}`);
  });
}

/**
 * Parse one of a fixed set of values
 */
export function parseEnum<T extends string>(
  env: EnvSource,
  key: string,
  defaultValue: T,
  values: readonly [T, ...T[]]
): T {
  const schema = z.enum(values);
  return parseEnvVar(env, key, defaultValue, (value) => schema.parse(value.trim().toLowerCase()));
}

export function parseString(env: EnvSource, key: string, defaultValue: string): string {
  return parseEnvVar(env, key, defaultValue, (value) => value);
}

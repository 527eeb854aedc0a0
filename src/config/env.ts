/**
 * Environment variable loading and typed readers.
 *
 * `.env` is loaded once on import. Every reader returns the default when
 * the variable is unset or empty and throws ConfigError when it is set to
 * something unparseable, so a typo never silently falls back.
 */

import "dotenv/config";
import { ValidationError } from "../errors/index.js";

export class ConfigError extends ValidationError {
  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super(message, variable ? [{ path: [variable], message, code: "custom" }] : []);
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable restricted to a closed set.
 */
export function optionalEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`,
      key
    );
  }
  return match;
}

/**
 * Get an optional environment variable as a positive integer.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a non-negative integer, got: ${value}`,
      key
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a finite number.
 */
export function optionalEnvFloat(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a number, got: ${value}`,
      key
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    key
  );
}

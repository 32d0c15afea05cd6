/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable as a positive integer.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value || parsed < 1) {
    throw new ConfigError(
      `Environment variable ${key} must be a positive integer, got: ${value}`
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
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Harvest configuration loader and validator.
 *
 * Responsible for:
 * - Merging CLI/environment overrides onto the defaults
 * - Validating against the schema with fail-fast behavior
 * - Freezing configuration to enforce immutability for the run
 */

import type { ZodIssue } from "zod";
import {
  HarvestConfigSchema,
  type FeatureFlags,
  type HarvestConfig,
  type RetryPolicy,
  type StorageLayout,
} from "./schema.js";
import { DEFAULT_HARVEST_CONFIG } from "./defaults.js";

/**
 * Structured validation error for harvest configuration.
 */
export class HarvestConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "HarvestConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Harvest configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Overrides accepted on top of a base configuration. Nested groups may be
 * overridden field by field.
 */
export interface HarvestConfigOverrides {
  query?: string;
  limit?: number;
  maxOutputBytes?: number;
  latestMaxItems?: number;
  pacingMs?: number;
  retry?: Partial<RetryPolicy>;
  flags?: Partial<FeatureFlags>;
  storage?: Partial<StorageLayout>;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load harvest configuration.
 *
 * @throws HarvestConfigError if validation fails
 */
export function loadHarvestConfig(input: unknown): Readonly<HarvestConfig> {
  const result = HarvestConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new HarvestConfigError(
      `Invalid harvest configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Apply overrides to a base configuration, then validate and freeze.
 * Undefined override fields keep the base value.
 */
export function resolveHarvestConfig(
  overrides: HarvestConfigOverrides,
  base: HarvestConfig = DEFAULT_HARVEST_CONFIG
): Readonly<HarvestConfig> {
  return loadHarvestConfig({
    query: overrides.query ?? base.query,
    limit: overrides.limit ?? base.limit,
    maxOutputBytes: overrides.maxOutputBytes ?? base.maxOutputBytes,
    latestMaxItems: overrides.latestMaxItems ?? base.latestMaxItems,
    pacingMs: overrides.pacingMs ?? base.pacingMs,
    retry: { ...base.retry, ...definedEntries(overrides.retry) },
    flags: { ...base.flags, ...definedEntries(overrides.flags) },
    storage: { ...base.storage, ...definedEntries(overrides.storage) },
  });
}

function definedEntries(value: object | undefined): Record<string, unknown> {
  if (!value) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined)
  );
}

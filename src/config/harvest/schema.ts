/**
 * Harvest run configuration schema.
 *
 * The configuration is validated once per run and frozen. Every batch in
 * the run sees the same query, budgets and feature flags, so a report can
 * always be traced back to the parameters that produced it.
 */

import { z } from "zod";

/**
 * Retry policy for a single external call.
 */
export const RetryPolicySchema = z
  .object({
    maxAttempts: z
      .number()
      .int()
      .min(1)
      .describe("Attempts per external call before it is surfaced as a hard failure"),

    initialDelayMs: z
      .number()
      .int()
      .min(0)
      .describe("Delay before the first retry"),

    backoffMultiplier: z
      .number()
      .min(1)
      .describe("Factor applied to the delay after every failed attempt"),

    maxDelayMs: z
      .number()
      .int()
      .min(0)
      .describe("Upper bound on a single retry delay"),

    jitterMs: z
      .number()
      .int()
      .min(0)
      .describe("Random extra delay added to every retry"),
  })
  .strict();

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

/**
 * Feature flags for optional enrichment and diagnostics.
 */
export const FeatureFlagsSchema = z
  .object({
    enrichSample: z
      .boolean()
      .describe("Fetch sample attributes for classification and geo inference"),

    enrichProject: z
      .boolean()
      .describe("Fetch project metadata for kept records"),

    debug: z
      .boolean()
      .describe("Write per-batch reports and decision trails"),
  })
  .strict();

export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>;

/**
 * On-disk layout. Durable state lives under dataDir, published artifacts
 * under docsDir.
 */
export const StorageLayoutSchema = z
  .object({
    dataDir: z.string().min(1).describe("Durable log, ledgers and caches"),
    docsDir: z.string().min(1).describe("Published exports and reports"),
  })
  .strict();

export type StorageLayout = z.infer<typeof StorageLayoutSchema>;

/**
 * Complete harvest configuration.
 */
export const HarvestConfigSchema = z
  .object({
    query: z.string().min(1).describe("Catalog search expression"),

    limit: z
      .number()
      .int()
      .min(1)
      .describe("Maximum raw ids requested per search call"),

    maxOutputBytes: z
      .number()
      .int()
      .min(1024)
      .describe("Byte budget for every exported artifact and log part"),

    latestMaxItems: z
      .number()
      .int()
      .min(0)
      .describe("Maximum items offered to the latest-additions view"),

    pacingMs: z
      .number()
      .int()
      .min(0)
      .describe("Minimum spacing between consecutive successful external calls"),

    retry: RetryPolicySchema.describe("Backoff policy for failed external calls"),

    flags: FeatureFlagsSchema.describe("Optional enrichment and diagnostics"),

    storage: StorageLayoutSchema.describe("Directory layout"),
  })
  .strict();

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;

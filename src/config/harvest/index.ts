/**
 * Harvest run configuration module.
 *
 * Usage:
 *   import { resolveHarvestConfig } from "./config/harvest/index.js";
 *
 *   const harvest = resolveHarvestConfig({ limit: 200, flags: { debug: true } });
 */

export {
  AssayClass,
  Confidence,
  ResolutionMethod,
  DropReason,
  HarvestMode,
} from "./enums.js";

export type {
  HarvestConfig,
  RetryPolicy,
  FeatureFlags,
  StorageLayout,
} from "./schema.js";

export {
  HarvestConfigSchema,
  RetryPolicySchema,
  FeatureFlagsSchema,
  StorageLayoutSchema,
} from "./schema.js";

export {
  loadHarvestConfig,
  resolveHarvestConfig,
  HarvestConfigError,
  type ConfigValidationIssue,
  type HarvestConfigOverrides,
} from "./loader.js";

export {
  DEFAULT_HARVEST_CONFIG,
  DEFAULT_QUERY,
  DEFAULT_MAX_OUTPUT_BYTES,
} from "./defaults.js";

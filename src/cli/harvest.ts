#!/usr/bin/env node
/**
 * Harvest command: fetch new catalog records, resolve and deduplicate
 * them, append survivors to the durable log, rebuild the exports.
 *
 * Usage:
 *   node --import tsx src/cli/harvest.ts [options]
 *   npm run harvest -- [options]
 *
 * Modes:
 *   --mode daily            Recent window (--days, default 7)
 *   --mode backfill-year    One batch per day of --year (optionally --through YYYY-MM-DD)
 *   --mode crawl            Page through every match (--page-size, --max, --stop-after-new, --sort)
 *
 * Options:
 *   --config <path>         Full harvest configuration JSON (defaults built in)
 *   --query <text>          Catalog search expression
 *   --limit <n>             Raw ids per search call (daily / backfill)
 *   --max-bytes <n>         Byte budget per exported artifact and log part
 *   --latest-max <n>        Items offered to latest.json
 *   --pacing-ms <n>         Gap between successful upstream calls
 *   --enrich-sample         Fetch sample attributes for kept records
 *   --enrich-project        Fetch project summaries for kept records
 *   --debug                 Debug logging and an NDJSON decision trail
 *   --data-dir <path>       Durable state directory
 *   --docs-dir <path>       Published artifacts directory
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Run finished (including runs that added nothing)
 *   1 - Configuration error or fatal run failure
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  HarvestConfigError,
  HarvestMode,
  config as appConfig,
  configuredLogLevel,
  loadHarvestConfig,
  resolveHarvestConfig,
  validateConfig,
  DEFAULT_HARVEST_CONFIG,
  type HarvestConfig,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  createHarvestContext,
  describeTotals,
  openHarvestState,
  runHarvest,
  type HarvestPlan,
} from "../pipeline/index.js";
import { RunReporter } from "../report/index.js";
import {
  AxiosTransport,
  CallGate,
  EutilsClient,
  Pacer,
  RetryExecutor,
} from "../source/index.js";
import { harvestPaths } from "../storage/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: harvest [options]

Modes:
  --mode daily            Recent window (--days, default 7)
  --mode backfill-year    One batch per day of --year (optionally --through YYYY-MM-DD)
  --mode crawl            Page through every match (--page-size, --max, --stop-after-new, --sort)

Options:
  --config <path>         Full harvest configuration JSON
  --query <text>          Catalog search expression
  --limit <n>             Raw ids per search call
  --max-bytes <n>         Byte budget per exported artifact and log part
  --latest-max <n>        Items offered to latest.json
  --pacing-ms <n>         Gap between successful upstream calls
  --enrich-sample         Fetch sample attributes for kept records
  --enrich-project        Fetch project summaries for kept records
  --debug                 Debug logging and an NDJSON decision trail
  --data-dir <path>       Durable state directory
  --docs-dir <path>       Published artifacts directory
  -h, --help              Show this help message
`;

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      mode: { type: "string", default: "daily" },
      days: { type: "string", default: "7" },
      year: { type: "string" },
      through: { type: "string" },
      "page-size": { type: "string", default: "500" },
      max: { type: "string" },
      "stop-after-new": { type: "string" },
      sort: { type: "string" },
      config: { type: "string" },
      query: { type: "string" },
      limit: { type: "string" },
      "max-bytes": { type: "string" },
      "latest-max": { type: "string" },
      "pacing-ms": { type: "string" },
      "enrich-sample": { type: "boolean", default: false },
      "enrich-project": { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
      "data-dir": { type: "string" },
      "docs-dir": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  return values;
}

type CliValues = ReturnType<typeof parseCliArgs>;

function intOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim() || parsed < 0) {
    throw new ConfigError(`--${name} must be a non-negative integer, got: ${value}`);
  }
  return parsed;
}

function requiredInt(name: string, value: string | undefined): number {
  const parsed = intOption(name, value);
  if (parsed === undefined) {
    throw new ConfigError(`--${name} is required for this mode`);
  }
  return parsed;
}

/**
 * Build the harvest plan for the selected mode.
 */
function buildPlan(args: CliValues): HarvestPlan {
  const mode = HarvestMode.safeParse(args.mode);
  if (!mode.success) {
    throw new ConfigError(
      `--mode must be one of ${HarvestMode.options.join(", ")}, got: ${String(args.mode)}`
    );
  }

  switch (mode.data) {
    case "daily":
      return { mode: "daily", days: requiredInt("days", args.days) };
    case "backfill-year": {
      if (args.through !== undefined && !/^\d{4}-\d{2}-\d{2}$/.test(args.through)) {
        throw new ConfigError(`--through must be YYYY-MM-DD, got: ${args.through}`);
      }
      return {
        mode: "backfill-year",
        year: requiredInt("year", args.year),
        ...(args.through ? { through: args.through } : {}),
      };
    }
    case "crawl": {
      const maxRecords = intOption("max", args.max);
      const stopAfterNew = intOption("stop-after-new", args["stop-after-new"]);
      return {
        mode: "crawl",
        pageSize: requiredInt("page-size", args["page-size"]),
        ...(maxRecords !== undefined ? { maxRecords } : {}),
        ...(stopAfterNew !== undefined ? { stopAfterNew } : {}),
        ...(args.sort ? { sort: args.sort } : {}),
      };
    }
  }
}

/**
 * Defaults (or --config file), then environment directories, then flags.
 */
function buildHarvestConfig(args: CliValues): Readonly<HarvestConfig> {
  let base: HarvestConfig = DEFAULT_HARVEST_CONFIG;
  if (args.config) {
    const path = resolve(args.config);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Config file is not valid JSON: ${path} (${String(err)})`);
    }
    base = loadHarvestConfig(raw);
  }

  return resolveHarvestConfig(
    {
      query: args.query,
      limit: intOption("limit", args.limit),
      maxOutputBytes: intOption("max-bytes", args["max-bytes"]),
      latestMaxItems: intOption("latest-max", args["latest-max"]),
      pacingMs: intOption("pacing-ms", args["pacing-ms"]),
      flags: {
        enrichSample: args["enrich-sample"] || undefined,
        enrichProject: args["enrich-project"] || undefined,
        debug: args.debug || appConfig.debug || undefined,
      },
      storage: {
        dataDir: args["data-dir"] ?? (args.config ? undefined : appConfig.dataDir),
        docsDir: args["docs-dir"] ?? (args.config ? undefined : appConfig.docsDir),
      },
    },
    base
  );
}

function createSource(harvest: Readonly<HarvestConfig>, logger: Logger): EutilsClient {
  const contact = appConfig.source.email ? ` (${appConfig.source.email})` : "";
  return new EutilsClient({
    transport: new AxiosTransport({
      timeoutMs: appConfig.source.timeoutMs,
      userAgent: `${appConfig.appName}${contact}`,
    }),
    gate: new CallGate(
      new RetryExecutor(harvest.retry, {
        onRetry: (label, attempt) =>
          logger.warn("Retrying upstream call", {
            call: label,
            attempt: attempt.attemptNumber,
            delayMs: attempt.delayMs,
            error: attempt.error,
          }),
      }),
      new Pacer(harvest.pacingMs)
    ),
    credentials: appConfig.source,
  });
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  const runId = initRunId();

  validateConfig();
  const plan = buildPlan(args);
  const harvest = buildHarvestConfig(args);
  const paths = harvestPaths(harvest.storage);

  const logger = createLogger({
    level: harvest.flags.debug ? "debug" : configuredLogLevel(),
    logDir: paths.processLogDir,
  });
  logger.info("Harvest starting", { runId, plan, query: harvest.query, flags: harvest.flags });

  const state = openHarvestState(paths, harvest.maxOutputBytes, logger);
  const reporter = new RunReporter({
    runId,
    mode: plan.mode,
    logger,
    trailPath: harvest.flags.debug ? paths.trailPath(runId) : null,
    reportPath: paths.reportPath,
  });
  const ctx = createHarvestContext({
    config: harvest,
    source: createSource(harvest, logger),
    state,
    reporter,
    logger,
    runId,
  });

  const result = await runHarvest(ctx, plan, paths);
  console.log(describeTotals(result.summary.totals));
  console.log(
    `corpus: ${result.exports.totalRecords} record(s) in ${result.exports.parts} part(s); ` +
      `latest: ${result.exports.latestCount}`
  );
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("harvest.ts") ||
   process.argv[1].endsWith("harvest.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    if (err instanceof HarvestConfigError) {
      console.error(err.format());
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error: ${message}`);
    }
    process.exit(1);
  });
}

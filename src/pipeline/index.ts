export {
  createHarvestContext,
  harvestBatch,
  runBatch,
  type BatchOutcome,
  type BatchSpec,
  type HarvestContext,
  type HarvestContextInit,
  type PendingBatch,
} from "./harvest.js";
export {
  daysOfYear,
  describeTotals,
  runHarvest,
  runPlan,
  type HarvestPlan,
  type HarvestRunResult,
} from "./modes.js";
export {
  commitBatch,
  openHarvestState,
  type CommitResult,
  type HarvestCaches,
  type HarvestState,
} from "./state.js";

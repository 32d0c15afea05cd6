export {
  BatchTally,
  RunReporter,
  emptyCounters,
  type BatchCounters,
  type BatchReport,
  type Decision,
  type DecisionLine,
  type RunReporterOptions,
  type RunStatus,
  type RunSummary,
} from "./reporter.js";

export {
  collapseBatch,
  type BatchCandidate,
  type CollapseDecision,
  type CollapseResult,
  type KeptRecord,
} from "./collapse.js";

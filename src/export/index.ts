export { partFileName, serializePart, writeChunked, type ChunkOptions, type PartInfo } from "./chunked.js";
export {
  buildLatest,
  largestFittingPrefix,
  serializeLatest,
  type LatestDocument,
} from "./latest.js";
export {
  RECORDS_BASENAME,
  latestItem,
  rebuildExports,
  type ExportManifest,
  type LatestItem,
  type RebuildOptions,
  type RebuildSummary,
} from "./rebuild.js";

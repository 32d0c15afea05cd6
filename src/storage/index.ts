export {
  StorageError,
  appendLines,
  fileSize,
  listDir,
  readLines,
  readTextFile,
  removeFile,
  writeJsonAtomic,
  writeTextAtomic,
} from "./files.js";
export { CacheStore, type CacheLookup, type CacheStoreOptions } from "./cache-store.js";
export { DedupLedger, IdSet, type LedgerFlushResult, type LedgerPaths } from "./ledger.js";
export {
  DurableLog,
  StoredRecordSchema,
  type DurableLogOptions,
  type LogReadStats,
  type StoredRecord,
} from "./durable-log.js";
export {
  CACHE_NAMESPACES,
  harvestPaths,
  type CacheNamespace,
  type HarvestPaths,
} from "./layout.js";

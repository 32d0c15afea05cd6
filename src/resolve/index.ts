export { findAccession, findFirstAccession, normalizeAccession } from "./accession.js";
export {
  EntityResolver,
  LinkCacheEntrySchema,
  type EntityResolverOptions,
  type LinkCacheEntry,
} from "./resolver.js";

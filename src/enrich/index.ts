export { CachedLookup, type CachedLookupOptions, type LookupOutcome } from "./cached-lookup.js";
export { sampleCard } from "./sample-card.js";
export { ProjectDetailsSchema, SampleDetailsSchema } from "./schemas.js";

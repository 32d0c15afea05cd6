import type { SampleCard, SampleDetails } from "../types/index.js";

/** Card field → attribute names that carry it, first non-empty wins. */
const CARD_KEYS = {
  collectionDate: ["collection_date", "collection date"],
  sampleName: ["sample_name", "sample name"],
  sampleType: ["sample_type", "sample type", "isolation_source", "isolation source"],
  host: ["host", "host scientific name"],
  envBiome: ["env_biome", "env_broad_scale", "broad-scale environmental context"],
  envFeature: ["env_feature", "env_local_scale", "local-scale environmental context"],
  envMaterial: ["env_material", "env_medium", "environmental medium"],
  depthOrAltitude: ["depth", "altitude", "elevation"],
  temperature: ["temp", "temperature"],
  ph: ["ph"],
} as const satisfies Record<string, readonly string[]>;

function pick(lowered: ReadonlyMap<string, string>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = lowered.get(key);
    if (value) return value;
  }
  return "";
}

/**
 * Display-friendly subset of a sample's attributes. Attribute names are
 * matched case-insensitively.
 */
export function sampleCard(details: SampleDetails): SampleCard {
  const lowered = new Map<string, string>();
  for (const [key, value] of Object.entries(details.attributes)) {
    const name = key.trim().toLowerCase();
    const text = value.trim();
    if (text && !lowered.has(name)) lowered.set(name, text);
  }

  return {
    accession: details.accession,
    title: details.title,
    organism: details.organism,
    collectionDate: pick(lowered, CARD_KEYS.collectionDate),
    sampleName: pick(lowered, CARD_KEYS.sampleName),
    sampleType: pick(lowered, CARD_KEYS.sampleType),
    host: pick(lowered, CARD_KEYS.host),
    envBiome: pick(lowered, CARD_KEYS.envBiome),
    envFeature: pick(lowered, CARD_KEYS.envFeature),
    envMaterial: pick(lowered, CARD_KEYS.envMaterial),
    depthOrAltitude: pick(lowered, CARD_KEYS.depthOrAltitude),
    temperature: pick(lowered, CARD_KEYS.temperature),
    ph: pick(lowered, CARD_KEYS.ph),
    attributes: details.attributes,
  };
}

export { classifyAssay, type AssayInput } from "./assay.js";
export {
  COUNTRY_ALIASES,
  canonicalCountry,
  inferGeo,
  parseCoordinates,
  parseLocation,
  scanCountry,
} from "./geo.js";
export { normalizeText } from "./text.js";

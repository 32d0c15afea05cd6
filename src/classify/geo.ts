/**
 * Best-effort location inference from sample attribute dictionaries.
 *
 * Location strings come in two shapes:
 *
 *   "Country: Region, City"   colon form, left side is the country
 *   "City, Region, Country"   comma form, left side is the city
 *
 * In both forms the region is the segment just before the last one, so
 * "Brooklyn, Kings County, New York, USA" puts New York in the region.
 *
 * Coordinates are taken from the first lat/lon attribute that holds two
 * numbers, either plain ("40.7, -74.0") or hemisphere-tagged
 * ("40.7 N 74.0 W").
 */

import type { GeoGuess } from "../types/index.js";
import { escapeRegExp, normalizeText } from "./text.js";

const LOCATION_KEYS = [
  "geo_loc_name",
  "geographic location",
  "geographic_location",
  "country",
  "location",
];

const LAT_LON_KEYS = ["lat_lon", "latitude and longitude", "latitude_longitude"];

/** Placeholder values submitters use instead of leaving a field empty. */
const MISSING_VALUES = new Set([
  "missing",
  "not collected",
  "not applicable",
  "not provided",
  "unknown",
  "na",
  "n/a",
  "none",
]);

/**
 * Normalized country spellings → canonical name. Multi-word keys first so
 * the fallback text scan prefers the longest match.
 */
export const COUNTRY_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["united states of america", "United States"],
  ["united states", "United States"],
  ["united kingdom", "United Kingdom"],
  ["united arab emirates", "United Arab Emirates"],
  ["republic of korea", "South Korea"],
  ["people's republic of china", "China"],
  ["u.s.a.", "United States"],
  ["u.s.a", "United States"],
  ["usa", "United States"],
  ["u.k.", "United Kingdom"],
  ["uk", "United Kingdom"],
  ["england", "United Kingdom"],
  ["scotland", "United Kingdom"],
  ["wales", "United Kingdom"],
  ["uae", "United Arab Emirates"],
];

const ALIAS_MAP = new Map(COUNTRY_ALIASES);

const PLAIN_COORDS_RE = /(-?\d+(?:\.\d+)?)\s*[, ]\s*(-?\d+(?:\.\d+)?)/;
const HEMISPHERE_COORDS_RE = /(\d+(?:\.\d+)?)\s*([NS])[\s,]+(\d+(?:\.\d+)?)\s*([EW])/i;

function isMissing(value: string): boolean {
  return MISSING_VALUES.has(normalizeText(value));
}

function firstAttribute(
  attributes: Readonly<Record<string, string>>,
  keys: readonly string[]
): string {
  for (const key of keys) {
    const value = attributes[key]?.trim();
    if (value && !isMissing(value)) return value;
  }
  return "";
}

function titleCase(value: string): string {
  return value
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

export function canonicalCountry(value: string): string {
  const normalized = normalizeText(value);
  if (!normalized) return "";
  return ALIAS_MAP.get(normalized) ?? titleCase(normalized);
}

function splitBits(value: string): string[] {
  return value
    .split(",")
    .map((bit) => bit.trim())
    .filter((bit) => bit.length > 0);
}

interface Place {
  country: string;
  region: string;
  city: string;
}

export function parseLocation(raw: string): Place {
  const colon = raw.indexOf(":");
  if (colon >= 0) {
    const bits = splitBits(raw.slice(colon + 1));
    return {
      country: raw.slice(0, colon).trim(),
      city: bits.at(-1) ?? "",
      region: bits.length >= 2 ? (bits.at(-2) ?? "") : "",
    };
  }

  const bits = splitBits(raw);
  if (bits.length === 0) return { country: "", region: "", city: "" };
  if (bits.length === 1) return { country: bits[0] ?? "", region: "", city: "" };
  return {
    city: bits[0] ?? "",
    region: bits.length >= 3 ? (bits.at(-2) ?? "") : "",
    country: bits.at(-1) ?? "",
  };
}

export function parseCoordinates(raw: string): { lat: string; lon: string } {
  const hemisphere = HEMISPHERE_COORDS_RE.exec(raw);
  if (hemisphere) {
    const [, lat = "", ns = "", lon = "", ew = ""] = hemisphere;
    return {
      lat: ns.toUpperCase() === "S" ? `-${lat}` : lat,
      lon: ew.toUpperCase() === "W" ? `-${lon}` : lon,
    };
  }
  const plain = PLAIN_COORDS_RE.exec(raw);
  if (plain) {
    const [, lat = "", lon = ""] = plain;
    return { lat, lon };
  }
  return { lat: "", lon: "" };
}

/**
 * Scan free text for a known country alias, on word boundaries.
 */
export function scanCountry(text: string): string {
  const blob = normalizeText(text);
  if (!blob) return "";
  for (const [alias, country] of COUNTRY_ALIASES) {
    const pattern = new RegExp(`(^|[^a-z])${escapeRegExp(alias)}($|[^a-z])`);
    if (pattern.test(blob)) return country;
  }
  return "";
}

/**
 * Infer a location. Missing information yields empty fields, never an error.
 *
 * @param fallbacks - free text (title, run-info fields) scanned for a
 *   country name when no location attribute names one
 */
export function inferGeo(
  attributes: Readonly<Record<string, string>>,
  fallbacks: readonly string[] = [],
  sampleAccession = ""
): GeoGuess {
  const raw = firstAttribute(attributes, LOCATION_KEYS);
  const place = parseLocation(raw);
  let country = canonicalCountry(place.country);
  if (!country) {
    country = scanCountry(fallbacks.join(" | "));
  }

  const coords = parseCoordinates(firstAttribute(attributes, LAT_LON_KEYS));

  return {
    country,
    region: place.region,
    city: place.city,
    lat: coords.lat,
    lon: coords.lon,
    raw,
    sampleAccession,
  };
}

import usStates from "./us-states.json";

/**
 * US location normalization for registry queries.
 * The registry matches `query.locn` best on "City, ST", so free-form
 * "City StateName" input is rewritten to that form when the state is recognized.
 */

const NAME_TO_CODE = new Map<string, string>(
  Object.entries(usStates).map(([name, code]) => [name.toLowerCase(), code])
);
const CODES = new Set<string>(Object.values(usStates));
// Longest first so "West Virginia" wins over "Virginia"
const NAMES_LONGEST_FIRST = [...NAME_TO_CODE.keys()].sort((a, b) => b.length - a.length);

const CITY_CODE_PATTERN = /^(.+?),\s*([A-Za-z]{2})$/;

/** Resolves a bare state name or two-letter code to its code. */
export function stateCodeFor(value: string): string | undefined {
  const trimmed = value.trim();
  const upper = trimmed.toUpperCase();
  if (CODES.has(upper)) {
    return upper;
  }
  return NAME_TO_CODE.get(trimmed.toLowerCase());
}

export function normalizeLocation(raw: string): string {
  const trimmed = raw.trim();
  if (stateCodeFor(trimmed)) {
    return raw;
  }

  const withCode = CITY_CODE_PATTERN.exec(trimmed);
  if (withCode) {
    const code = withCode[2].toUpperCase();
    return CODES.has(code) ? `${withCode[1].trim()}, ${code}` : raw;
  }

  if (!trimmed.includes(",")) {
    const split = splitStateSuffix(trimmed);
    if (split) {
      return `${split.city}, ${split.code}`;
    }
  }

  return raw;
}

/**
 * Qualifies a city-only location with the state of `stateSource` when that
 * source is a bare state ("California", "CA"). Locations that already carry a
 * state, and sources that are not a bare state, are returned unchanged.
 */
export function qualifyWithState(location: string, stateSource: string): string {
  if (hasState(location)) {
    return location;
  }
  const code = stateCodeFor(stateSource);
  return code ? `${location.trim()}, ${code}` : location;
}

function hasState(location: string): boolean {
  const trimmed = location.trim();
  if (stateCodeFor(trimmed)) {
    return true;
  }
  const withCode = CITY_CODE_PATTERN.exec(trimmed);
  if (withCode) {
    return CODES.has(withCode[2].toUpperCase());
  }
  const comma = trimmed.lastIndexOf(",");
  if (comma >= 0) {
    return NAME_TO_CODE.has(trimmed.slice(comma + 1).trim().toLowerCase());
  }
  return splitStateSuffix(trimmed) !== undefined;
}

function splitStateSuffix(text: string): { city: string; code: string } | undefined {
  const lower = text.toLowerCase();
  // A bare multi-word state ("West Virginia") is not "West" in Virginia
  if (NAME_TO_CODE.has(lower)) {
    return undefined;
  }
  for (const name of NAMES_LONGEST_FIRST) {
    if (lower.endsWith(` ${name}`)) {
      const city = text.slice(0, text.length - name.length).trim();
      const code = NAME_TO_CODE.get(name);
      if (city && code) {
        return { city, code };
      }
    }
  }
  return undefined;
}

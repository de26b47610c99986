import { InvalidKeyInputError } from "../reconciliation/errors.js";
import type { JurisdictionKey } from "../reconciliation/types.js";

export const KEY_SEPARATOR = "_";

export function normalizeCity(city: string): string {
  return city.trim().replace(/\s+/g, " ").toUpperCase();
}

export function normalizeState(state: string): string {
  return state.trim().toUpperCase();
}

/**
 * Canonical join key shared by every source: `ADDISON_TX`.
 *
 * The state must already be a postal code; name translation happens in
 * resolveStateCode before this is called.
 */
export function normalizeKey(city: string, state: string): JurisdictionKey {
  const normalizedCity = normalizeCity(city);
  const normalizedState = normalizeState(state);

  if (normalizedCity.length === 0 || normalizedState.length === 0) {
    throw new InvalidKeyInputError(city, state);
  }

  return `${normalizedCity}${KEY_SEPARATOR}${normalizedState}`;
}

// Splits on the last separator so city names may contain "_".
export function splitKey(key: JurisdictionKey): { city: string; state: string } | null {
  const index = key.lastIndexOf(KEY_SEPARATOR);
  if (index <= 0 || index === key.length - 1) {
    return null;
  }

  return {
    city: key.slice(0, index),
    state: key.slice(index + 1)
  };
}

export function renormalizeKey(key: JurisdictionKey): JurisdictionKey {
  const parts = splitKey(key);
  if (!parts) {
    throw new InvalidKeyInputError(key, "", "key has no CITY_ST shape");
  }

  return normalizeKey(parts.city, parts.state);
}

/**
 * Platform exports carry locations as "CITY, ST".
 */
export function parseCityState(location: string | null | undefined): { city: string; state: string } | null {
  if (!location) {
    return null;
  }

  const match = location.trim().toUpperCase().match(/^(.+?),\s*([A-Z]{2})$/);
  const city = match?.[1]?.trim();
  const state = match?.[2];
  if (!city || !state) {
    return null;
  }

  return { city: normalizeCity(city), state };
}

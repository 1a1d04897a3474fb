/**
 * Adapters turning plain containers into fetch sources.
 */

import type { FetchSource } from "./types";

export function fetchFromMap(values: ReadonlyMap<string, string>): FetchSource {
  return { lookup: (name) => values.get(name) };
}

export function fetchFromRecord(values: Readonly<Record<string, string>>): FetchSource {
  return {
    lookup: (name) => (Object.hasOwn(values, name) ? values[name] : undefined),
  };
}

export function fetchFromFunction(lookup: (name: string) => string | undefined): FetchSource {
  return { lookup };
}

/** A source with no values; every placeholder resolves to an empty string. */
export const EMPTY_FETCH_SOURCE: FetchSource = { lookup: () => undefined };

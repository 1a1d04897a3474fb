/**
 * Fetch Types
 */

import type { StyleId } from "../richtext/types";

/**
 * External provider of placeholder values. Called once per placeholder per
 * resolution pass; must not block.
 */
export interface FetchSource {
  lookup(name: string): string | undefined;
}

/** A run of text ready for styling and shaping */
export interface ResolvedRun {
  styles: readonly StyleId[];
  text: string;
}

/** Result of one resolution pass */
export interface ResolvedText {
  runs: ResolvedRun[];
  /** Value of every placeholder seen in this pass */
  values: ReadonlyMap<string, string>;
  /** True when any placeholder value differs from the previous pass */
  changed: boolean;
}

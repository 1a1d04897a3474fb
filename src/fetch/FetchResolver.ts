/**
 * Placeholder resolution with change tracking.
 */

import type { RichText } from "../richtext/types";
import { flattenSegments } from "../richtext/segments";
import type { FetchSource, ResolvedRun, ResolvedText } from "./types";

/**
 * Resolves the placeholders of one text object.
 *
 * Remembers the values of the previous pass so callers can skip re-shaping
 * when nothing moved. The first pass always reports a change.
 */
export class FetchResolver {
  private previous: Map<string, string> | null = null;

  /**
   * Flatten `tree` into styled runs, filling placeholders from `source`.
   * Missing values become empty strings. `source` is asked once per distinct
   * name; the empty name is never looked up and always resolves to "".
   */
  resolve(tree: RichText, source: FetchSource): ResolvedText {
    const runs: ResolvedRun[] = [];
    const values = new Map<string, string>();

    for (const leaf of flattenSegments(tree)) {
      let text: string;
      if (leaf.kind === "literal") {
        text = leaf.text;
      } else if (leaf.name === "") {
        text = "";
      } else {
        let value = values.get(leaf.name);
        if (value === undefined) {
          value = source.lookup(leaf.name) ?? "";
          values.set(leaf.name, value);
        }
        text = value;
      }
      if (text.length > 0) {
        runs.push({ styles: leaf.styles, text });
      }
    }

    const changed = this.previous === null || !sameValues(this.previous, values);
    this.previous = values;
    return { runs, values, changed };
  }

  /** Forget previous values; the next pass reports a change. */
  reset(): void {
    this.previous = null;
  }
}

function sameValues(a: ReadonlyMap<string, string>, b: ReadonlyMap<string, string>): boolean {
  if (a.size !== b.size) return false;
  for (const [name, value] of a) {
    if (b.get(name) !== value || !b.has(name)) return false;
  }
  return true;
}

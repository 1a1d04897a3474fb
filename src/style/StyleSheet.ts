/**
 * Style table mapping style ids to segment styles.
 */

import type { StyleId } from "../richtext/types";
import { parseColor } from "./colors";
import { FontWeight, joinStyles, type SegmentStyle } from "./types";

const EMPTY_STYLE: SegmentStyle = {};

/**
 * Resolves style ids found in markup.
 *
 * Lookup order for an id:
 * 1. styles registered with {@link StyleSheet.define}
 * 2. built-ins: `bold`, `italic`, `underline`, `strikethrough`,
 *    `v-<number>` (magic number), CSS color names and `#hex` colors (fill
 *    color)
 * 3. anything else becomes a boolean attribute named after the id
 */
export class StyleSheet {
  private styles = new Map<StyleId, SegmentStyle>();
  private resolved = new Map<string, SegmentStyle>();
  private warned = new Set<StyleId>();
  private _revision = 0;

  constructor(styles: Record<StyleId, SegmentStyle> = {}) {
    for (const [id, style] of Object.entries(styles)) {
      this.styles.set(id, style);
    }
  }

  /** Incremented whenever a named style is defined or removed */
  get revision(): number {
    return this._revision;
  }

  /** Register or replace a named style. */
  define(id: StyleId, style: SegmentStyle): this {
    this.styles.set(id, style);
    this.resolved.clear();
    this._revision++;
    return this;
  }

  /** Remove a named style. Returns whether it existed. */
  remove(id: StyleId): boolean {
    const removed = this.styles.delete(id);
    if (removed) {
      this.resolved.clear();
      this._revision++;
    }
    return removed;
  }

  has(id: StyleId): boolean {
    return this.styles.has(id);
  }

  /** Style contributed by a single id. */
  lookup(id: StyleId): SegmentStyle {
    const named = this.styles.get(id);
    if (named) return named;

    const builtin = builtinStyle(id);
    if (builtin) return builtin;

    if (!this.warned.has(id)) {
      this.warned.add(id);
      console.warn(`[StyleSheet] Unknown style "${id}", forwarding it as an attribute`);
    }
    return { attributes: { [id]: true } };
  }

  /**
   * Resolve an accumulated style list (outermost first). Later ids override
   * earlier ones key by key.
   */
  resolve(ids: readonly StyleId[]): SegmentStyle {
    if (ids.length === 0) return EMPTY_STYLE;

    const cacheKey = ids.join("\u0000");
    const cached = this.resolved.get(cacheKey);
    if (cached) return cached;

    let style = EMPTY_STYLE;
    for (const id of ids) {
      style = joinStyles(style, this.lookup(id));
    }
    this.resolved.set(cacheKey, style);
    return style;
  }
}

function builtinStyle(id: StyleId): SegmentStyle | undefined {
  if (id === "bold") return { weight: FontWeight.BOLD };
  if (id === "italic") return { italic: true };
  if (id === "underline") return { underline: true };
  if (id === "strikethrough") return { strikethrough: true };

  if (id.startsWith("v-")) {
    const value = id.slice(2);
    const magicNumber = Number(value);
    if (value.trim().length > 0 && Number.isFinite(magicNumber)) {
      return { magicNumber };
    }
  }

  const color = parseColor(id);
  if (color) return { color };

  return undefined;
}

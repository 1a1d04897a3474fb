/**
 * Glyph Atlas
 *
 * Caches rasterized glyphs on shelf-packed pages. When pages run out, least
 * recently used glyphs are evicted, except those requested during the current
 * pass: a mesh being built never points at recycled space.
 *
 * Empty glyphs (whitespace) are cached without page space. Evicting them frees
 * nothing, so they stay until {@link GlyphAtlas.clear}; there is one per face,
 * size and whitespace glyph.
 */

import type { GlyphBitmap } from "../sdf/types";
import { AtlasCapacityError } from "./AtlasCapacityError";
import { AtlasPage } from "./AtlasPage";
import {
  DEFAULT_ATLAS_OPTIONS,
  atlasKeyString,
  type AtlasKey,
  type AtlasOptions,
  type AtlasRect,
  type AtlasSlot,
  type AtlasStatus,
  type DirtyRegion,
  type UvRect,
} from "./types";

interface AtlasEntry {
  id: string;
  slot: AtlasSlot;
  /** Padded rectangle reserved on the page, null for empty glyphs */
  reserved: AtlasRect | null;
  generation: number;
  sequence: number;
}

const NO_UV: UvRect = { u0: 0, v0: 0, u1: 0, v1: 0 };
const NO_RECT: AtlasRect = { x: 0, y: 0, width: 0, height: 0 };

export class GlyphAtlas {
  readonly options: AtlasOptions;

  private pages: AtlasPage[] = [];
  private entries: (AtlasEntry | undefined)[] = [];
  private index = new Map<string, number>();
  private freeSlots: number[] = [];
  /** Entry slots requested during the current pass */
  private pinned = new Set<number>();
  private generation = 0;
  private sequence = 0;
  private evictionCount = 0;
  private _revision = 0;

  constructor(options: Partial<AtlasOptions> = {}) {
    this.options = { ...DEFAULT_ATLAS_OPTIONS, ...options };
    const { pageWidth, pageHeight, padding, maxPages } = this.options;
    if (!Number.isInteger(pageWidth) || !Number.isInteger(pageHeight) || pageWidth <= 0 || pageHeight <= 0) {
      throw new Error(`Atlas page size must be a positive integer, got ${pageWidth}x${pageHeight}`);
    }
    if (!Number.isInteger(padding) || padding < 0) {
      throw new Error(`Atlas padding must be a non-negative integer, got ${padding}`);
    }
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new Error(`Atlas maxPages must be at least 1, got ${maxPages}`);
    }
  }

  /**
   * Bumped whenever cached space is recycled (eviction or clear). Meshes built
   * at an older revision may reference stale pixels.
   */
  get revision(): number {
    return this._revision;
  }

  get pageCount(): number {
    return this.pages.length;
  }

  getPage(index: number): AtlasPage | undefined {
    return this.pages[index];
  }

  /** Start a new pass; entries of earlier passes become evictable. */
  beginPass(): void {
    this.generation++;
    this.pinned.clear();
  }

  /**
   * Return the cached slot for `key`, rasterizing it with `produce` on a miss.
   *
   * @throws AtlasCapacityError when the glyph cannot fit an empty page
   */
  getOrInsert(key: AtlasKey, produce: () => GlyphBitmap): AtlasSlot {
    const id = atlasKeyString(key);
    const existing = this.index.get(id);
    if (existing !== undefined) {
      const entry = this.entries[existing];
      if (entry) {
        this.touch(entry, existing);
        return entry.slot;
      }
    }

    const bitmap = produce();
    if (bitmap.width === 0 || bitmap.height === 0) {
      return this.store(id, {
        slot: {
          key,
          page: -1,
          rect: NO_RECT,
          left: bitmap.left,
          top: bitmap.top,
          margin: bitmap.margin,
          empty: true,
          uv: NO_UV,
        },
        reserved: null,
      });
    }

    const { pageWidth, pageHeight, padding } = this.options;
    if (bitmap.width > pageWidth || bitmap.height > pageHeight) {
      throw new AtlasCapacityError(bitmap.width, bitmap.height, pageWidth, pageHeight);
    }
    // Padding is dropped at the page edge
    const paddedWidth = Math.min(bitmap.width + padding, pageWidth);
    const paddedHeight = Math.min(bitmap.height + padding, pageHeight);

    const { page, reserved } = this.reserve(paddedWidth, paddedHeight);
    const rect = { x: reserved.x, y: reserved.y, width: bitmap.width, height: bitmap.height };
    this.pages[page]?.write(rect, bitmap.data);

    return this.store(id, {
      slot: {
        key,
        page,
        rect,
        left: bitmap.left,
        top: bitmap.top,
        margin: bitmap.margin,
        empty: false,
        uv: {
          u0: rect.x / pageWidth,
          v0: rect.y / pageHeight,
          u1: (rect.x + rect.width) / pageWidth,
          v1: (rect.y + rect.height) / pageHeight,
        },
      },
      reserved,
    });
  }

  /** Cached slot without touching recency */
  get(key: AtlasKey): AtlasSlot | undefined {
    const slot = this.index.get(atlasKeyString(key));
    return slot === undefined ? undefined : this.entries[slot]?.slot;
  }

  has(key: AtlasKey): boolean {
    return this.index.has(atlasKeyString(key));
  }

  /** Drop every entry and page. */
  clear(): void {
    this.pages = [];
    this.entries = [];
    this.index.clear();
    this.freeSlots = [];
    this.pinned.clear();
    this._revision++;
  }

  /** Drain the regions written or cleared since the last call, for texture upload. */
  takeDirtyRegions(): DirtyRegion[] {
    const regions: DirtyRegion[] = [];
    this.pages.forEach((page, index) => {
      for (const rect of page.takeDirty()) {
        regions.push({ page: index, ...rect });
      }
    });
    return regions;
  }

  getStatus(): AtlasStatus {
    let memoryBytes = 0;
    for (const page of this.pages) {
      memoryBytes += page.data.byteLength;
    }
    return {
      pageCount: this.pages.length,
      entryCount: this.index.size,
      evictionCount: this.evictionCount,
      memoryBytes,
    };
  }

  private touch(entry: AtlasEntry, slot: number): void {
    entry.generation = this.generation;
    entry.sequence = ++this.sequence;
    this.pinned.add(slot);
  }

  private store(id: string, fields: Pick<AtlasEntry, "slot" | "reserved">): AtlasSlot {
    const entry: AtlasEntry = { id, ...fields, generation: 0, sequence: 0 };
    const slot = this.freeSlots.pop() ?? this.entries.length;
    this.entries[slot] = entry;
    this.index.set(id, slot);
    this.touch(entry, slot);
    return entry.slot;
  }

  /** Find room on a page, growing or evicting as needed. */
  private reserve(width: number, height: number): { page: number; reserved: AtlasRect } {
    for (let page = 0; page < this.pages.length; page++) {
      const reserved = this.pages[page]?.allocate(width, height);
      if (reserved) return { page, reserved };
    }

    if (this.pages.length < this.options.maxPages) {
      return this.addPage(width, height);
    }

    for (const victim of this.evictionOrder()) {
      const page = this.evict(victim);
      const reserved = this.pages[page]?.allocate(width, height);
      if (reserved) return { page, reserved };
    }

    console.warn(
      `[GlyphAtlas] All ${this.pages.length} page(s) hold glyphs of the current pass, adding a page beyond maxPages (${this.options.maxPages})`
    );
    return this.addPage(width, height);
  }

  private addPage(width: number, height: number): { page: number; reserved: AtlasRect } {
    const page = new AtlasPage(this.options.pageWidth, this.options.pageHeight);
    this.pages.push(page);
    const reserved = page.allocate(width, height);
    if (!reserved) {
      throw new AtlasCapacityError(width, height, page.width, page.height);
    }
    return { page: this.pages.length - 1, reserved };
  }

  /** Unpinned entries holding page space, least recently used first. Empty glyphs are never listed. */
  private evictionOrder(): number[] {
    const order: number[] = [];
    this.entries.forEach((entry, slot) => {
      if (entry && entry.reserved && !this.pinned.has(slot)) {
        order.push(slot);
      }
    });
    return order.sort((a, b) => {
      const ea = this.entries[a];
      const eb = this.entries[b];
      if (!ea || !eb) return 0;
      return ea.generation - eb.generation || ea.sequence - eb.sequence;
    });
  }

  /** Remove an entry and free its space. Returns the page it lived on. */
  private evict(slot: number): number {
    const entry = this.entries[slot];
    if (!entry) return -1;

    const page = this.pages[entry.slot.page];
    if (page && entry.reserved) {
      page.clear(entry.reserved);
      page.release(entry.reserved);
    }
    this.entries[slot] = undefined;
    this.index.delete(entry.id);
    this.freeSlots.push(slot);
    this.evictionCount++;
    this._revision++;
    return entry.slot.page;
  }
}

/**
 * Atlas Page
 *
 * One grayscale page packed with shelves. Each shelf keeps a list of free
 * horizontal spans so released rectangles can be reused.
 */

import type { AtlasRect } from "./types";

interface Span {
  x: number;
  width: number;
}

interface Shelf {
  y: number;
  height: number;
  /** Free spans sorted by x, never adjacent */
  free: Span[];
}

export class AtlasPage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;

  private shelves: Shelf[] = [];
  private nextShelfY = 0;
  private dirty: AtlasRect[];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);
    // A new page needs a full upload once
    this.dirty = [{ x: 0, y: 0, width, height }];
  }

  /**
   * Reserve a rectangle. Uses the shortest shelf that is tall enough and has a
   * wide enough free span, else opens a new shelf below the last one.
   * Returns null when neither works.
   */
  allocate(width: number, height: number): AtlasRect | null {
    if (width > this.width || height > this.height) return null;

    let bestShelf: Shelf | undefined;
    let bestSpan: Span | undefined;
    for (const shelf of this.shelves) {
      if (shelf.height < height) continue;
      if (bestShelf && shelf.height >= bestShelf.height) continue;
      const span = shelf.free.find((candidate) => candidate.width >= width);
      if (span) {
        bestShelf = shelf;
        bestSpan = span;
      }
    }

    if (!bestShelf || !bestSpan) {
      if (this.nextShelfY + height > this.height) return null;
      bestSpan = { x: 0, width: this.width };
      bestShelf = { y: this.nextShelfY, height, free: [bestSpan] };
      this.shelves.push(bestShelf);
      this.nextShelfY += height;
    }

    const rect = { x: bestSpan.x, y: bestShelf.y, width, height };
    bestSpan.x += width;
    bestSpan.width -= width;
    if (bestSpan.width === 0) {
      bestShelf.free.splice(bestShelf.free.indexOf(bestSpan), 1);
    }
    return rect;
  }

  /** Return a rectangle obtained from `allocate` to the free list. */
  release(rect: AtlasRect): void {
    const shelf = this.shelves.find((candidate) => candidate.y === rect.y);
    if (!shelf) return;

    const free = shelf.free;
    let index = free.findIndex((span) => span.x > rect.x);
    if (index === -1) index = free.length;

    const span = { x: rect.x, width: rect.width };
    const before = free[index - 1];
    const after = free[index];
    if (before && before.x + before.width === span.x) {
      before.width += span.width;
      if (after && before.x + before.width === after.x) {
        before.width += after.width;
        free.splice(index, 1);
      }
    } else if (after && span.x + span.width === after.x) {
      after.x = span.x;
      after.width += span.width;
    } else {
      free.splice(index, 0, span);
    }

    // Trailing shelves that became empty give their height back
    let last = this.shelves[this.shelves.length - 1];
    while (last && isEmpty(last, this.width)) {
      this.shelves.pop();
      this.nextShelfY = last.y;
      last = this.shelves[this.shelves.length - 1];
    }
  }

  /** Copy a `width * height` bitmap into the page at `rect`. */
  write(rect: AtlasRect, source: Uint8Array): void {
    for (let row = 0; row < rect.height; row++) {
      const srcOffset = row * rect.width;
      this.data.set(source.subarray(srcOffset, srcOffset + rect.width), (rect.y + row) * this.width + rect.x);
    }
    this.markDirty(rect);
  }

  /** Zero the pixels of `rect`. */
  clear(rect: AtlasRect): void {
    for (let row = 0; row < rect.height; row++) {
      const offset = (rect.y + row) * this.width + rect.x;
      this.data.fill(0, offset, offset + rect.width);
    }
    this.markDirty(rect);
  }

  /** Regions changed since the last call */
  takeDirty(): AtlasRect[] {
    const dirty = this.dirty;
    this.dirty = [];
    return dirty;
  }

  /** Height consumed by shelves */
  get usedHeight(): number {
    return this.nextShelfY;
  }

  private markDirty(rect: AtlasRect): void {
    if (rect.width > 0 && rect.height > 0) {
      this.dirty.push({ ...rect });
    }
  }
}

function isEmpty(shelf: Shelf, pageWidth: number): boolean {
  const only = shelf.free[0];
  return shelf.free.length === 1 && only !== undefined && only.x === 0 && only.width === pageWidth;
}

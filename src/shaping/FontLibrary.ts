/**
 * Font Library
 *
 * Registry of font faces with CSS-like matching on family, style and weight.
 */

import { TofuFace } from "./TofuFace";
import type { FontFace } from "./types";

export interface FontLibraryOptions {
  /** Family used when a requested family has no registered faces */
  defaultFamily?: string;
  /** Face used when no family matches at all */
  fallback?: FontFace;
}

export class FontLibrary {
  readonly fallback: FontFace;
  private defaultFamily: string | undefined;
  private families = new Map<string, FontFace[]>();
  private cache = new Map<string, FontFace>();
  private _revision = 0;

  constructor(options: FontLibraryOptions = {}) {
    this.fallback = options.fallback ?? new TofuFace();
    this.defaultFamily = options.defaultFamily?.toLowerCase();
  }

  /** Incremented whenever face resolution may have changed */
  get revision(): number {
    return this._revision;
  }

  /** Add a face, replacing any face registered under the same id. */
  register(face: FontFace): this {
    this.unregister(face.id);
    const family = face.family.toLowerCase();
    const faces = this.families.get(family) ?? [];
    faces.push(face);
    this.families.set(family, faces);
    this.cache.clear();
    this._revision++;
    return this;
  }

  unregister(id: string): boolean {
    for (const [family, faces] of this.families) {
      const index = faces.findIndex((face) => face.id === id);
      if (index === -1) continue;
      faces.splice(index, 1);
      if (faces.length === 0) this.families.delete(family);
      this.cache.clear();
      this._revision++;
      return true;
    }
    return false;
  }

  setDefaultFamily(family: string | undefined): void {
    this.defaultFamily = family?.toLowerCase();
    this.cache.clear();
    this._revision++;
  }

  /** Registered family names, lowercased */
  get familyNames(): string[] {
    return [...this.families.keys()];
  }

  /**
   * Closest face for a request: matching family, then matching italic flag,
   * then nearest weight. Unknown families go to the default family, then to
   * the fallback face.
   */
  resolve(family: string, weight: number, italic: boolean): FontFace {
    const cacheKey = `${family.toLowerCase()}|${weight}|${italic}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const candidates =
      this.families.get(family.toLowerCase()) ??
      (this.defaultFamily !== undefined ? this.families.get(this.defaultFamily) : undefined);

    const face = candidates ? pickFace(candidates, weight, italic) : this.fallback;
    this.cache.set(cacheKey, face);
    return face;
  }
}

function pickFace(faces: readonly FontFace[], weight: number, italic: boolean): FontFace {
  const styled = faces.filter((face) => face.italic === italic);
  const pool = styled.length > 0 ? styled : faces;

  let best = pool[0]!;
  let bestDistance = Math.abs(best.weight - weight);
  for (const face of pool) {
    const distance = Math.abs(face.weight - weight);
    // Ties go to the heavier face
    if (distance < bestDistance || (distance === bestDistance && face.weight > best.weight)) {
      best = face;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Mutable placeholder values owned by the host.
 */

import type { FetchSource } from "./types";

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * A map-backed {@link FetchSource}. Writes that do not change the stored value
 * are ignored, so `version` only moves on real changes.
 */
export class FetchStore implements FetchSource {
  private values = new Map<string, string>();
  private _version = 0;

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.values.set(name, value);
    }
  }

  /** Incremented on every effective change */
  get version(): number {
    return this._version;
  }

  get size(): number {
    return this.values.size;
  }

  lookup(name: string): string | undefined {
    return this.values.get(name);
  }

  /** Store a string value. Returns whether the stored value changed. */
  set(name: string, value: string): boolean {
    if (this.values.get(name) === value) return false;
    this.values.set(name, value);
    this._version++;
    return true;
  }

  /**
   * Store a value that has a canonical string form. The stored text is parsed
   * and compared first, so `write("hp", 1)` over `"1.0"` keeps `"1.0"`.
   */
  write(name: string, value: number | bigint | boolean): boolean {
    const stored = this.values.get(name);
    if (stored !== undefined && parsesTo(stored, value)) return false;
    return this.set(name, String(value));
  }

  delete(name: string): boolean {
    const deleted = this.values.delete(name);
    if (deleted) this._version++;
    return deleted;
  }
}

function parsesTo(stored: string, value: number | bigint | boolean): boolean {
  if (typeof value === "number") {
    return stored.trim().length > 0 && Number(stored) === value;
  }
  if (typeof value === "bigint") {
    return INTEGER_PATTERN.test(stored) && BigInt(stored) === value;
  }
  return stored === String(value);
}

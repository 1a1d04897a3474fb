/**
 * Color parsing for style ids.
 */

import cssColors from "../data/cssColors.json";
import type { Color } from "../types/color";

const NAMED_COLORS = new Map<string, string>(Object.entries(cssColors));

const HEX_PATTERN = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse a lowercase CSS color name or a hex color (`#` followed by 3, 4, 6 or
 * 8 digits).
 *
 * @returns The color, or undefined when `value` is neither
 */
export function parseColor(value: string): Color | undefined {
  const named = NAMED_COLORS.get(value);
  if (named !== undefined) return parseHex(named);
  return parseHex(value);
}

function parseHex(value: string): Color | undefined {
  const match = HEX_PATTERN.exec(value);
  const digits = match?.[1];
  if (!digits) return undefined;

  const short = digits.length <= 4;
  const channels: number[] = [];
  for (let i = 0; i < digits.length; i += short ? 1 : 2) {
    const part = short ? digits.charAt(i).repeat(2) : digits.slice(i, i + 2);
    channels.push(parseInt(part, 16) / 255);
  }

  const [r = 0, g = 0, b = 0, a = 1] = channels;
  return [r, g, b, a];
}

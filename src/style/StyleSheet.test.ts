import { describe, it, expect, vi, afterEach } from "vitest";
import { StyleSheet } from "./StyleSheet";
import { parseColor } from "./colors";
import { applySegmentStyle, joinStyles, type TextStyle } from "./types";

describe("parseColor", () => {
  it("matches CSS color names exactly", () => {
    expect(parseColor("red")).toEqual([1, 0, 0, 1]);
    expect(parseColor("white")).toEqual([1, 1, 1, 1]);
    expect(parseColor("White")).toBeUndefined();
    expect(parseColor("RED")).toBeUndefined();
  });

  it("parses six digit hex colors", () => {
    const color = parseColor("#336699");
    expect(color?.[0]).toBeCloseTo(0.2);
    expect(color?.[1]).toBeCloseTo(0.4);
    expect(color?.[2]).toBeCloseTo(0.6);
    expect(color?.[3]).toBe(1);
  });

  it("expands short hex colors with alpha", () => {
    const color = parseColor("#0f08");
    expect(color?.slice(0, 3)).toEqual([0, 1, 0]);
    expect(color?.[3]).toBeCloseTo(136 / 255);
  });

  it("rejects hex without a leading #", () => {
    expect(parseColor("bad")).toBeUndefined();
    expect(parseColor("#12345")).toBeUndefined();
  });
});

describe("joinStyles", () => {
  it("lets the inner style override shared keys", () => {
    const joined = joinStyles(
      { weight: 700, color: [1, 0, 0, 1], attributes: { glow: 1, shake: true } },
      { color: [0, 0, 1, 1], attributes: { glow: 2 } }
    );
    expect(joined).toEqual({
      weight: 700,
      color: [0, 0, 1, 1],
      attributes: { glow: 2, shake: true },
    });
  });
});

describe("applySegmentStyle", () => {
  it("fills unset keys from the base style", () => {
    const base: TextStyle = {
      font: "sans-serif",
      size: 16,
      weight: 400,
      italic: false,
      color: [1, 1, 1, 1],
      magicNumber: 0,
      underline: false,
      strikethrough: false,
      attributes: {},
    };
    expect(applySegmentStyle(base, { size: 24, italic: true })).toEqual({
      ...base,
      size: 24,
      italic: true,
    });
  });
});

describe("StyleSheet", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves built-in styles", () => {
    const sheet = new StyleSheet();
    expect(sheet.lookup("bold")).toEqual({ weight: 700 });
    expect(sheet.lookup("italic")).toEqual({ italic: true });
    expect(sheet.lookup("underline")).toEqual({ underline: true });
    expect(sheet.lookup("strikethrough")).toEqual({ strikethrough: true });
    expect(sheet.lookup("v-2.5")).toEqual({ magicNumber: 2.5 });
    expect(sheet.lookup("blue")).toEqual({ color: [0, 0, 1, 1] });
  });

  it("prefers registered styles over built-ins", () => {
    const sheet = new StyleSheet({ red: { color: [0.5, 0, 0, 1] } });
    expect(sheet.lookup("red")).toEqual({ color: [0.5, 0, 0, 1] });
  });

  it("merges an accumulated style list with inner precedence", () => {
    const sheet = new StyleSheet({ title: { size: 32, weight: 300 } });
    expect(sheet.resolve(["title", "bold", "green"])).toEqual({
      size: 32,
      weight: 700,
      color: [0, 128 / 255, 0, 1],
    });
  });

  it("forwards unknown ids as attributes and warns once", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const sheet = new StyleSheet();

    expect(sheet.resolve(["wiggle"])).toEqual({ attributes: { wiggle: true } });
    sheet.lookup("wiggle");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[StyleSheet] Unknown style "wiggle", forwarding it as an attribute');
  });

  it("drops cached resolutions when a style is redefined", () => {
    const sheet = new StyleSheet({ accent: { color: [1, 0, 0, 1] } });
    expect(sheet.resolve(["accent"]).color).toEqual([1, 0, 0, 1]);

    sheet.define("accent", { color: [0, 1, 0, 1] });

    expect(sheet.resolve(["accent"]).color).toEqual([0, 1, 0, 1]);
  });

  it("bumps the revision when named styles change", () => {
    const sheet = new StyleSheet();
    expect(sheet.revision).toBe(0);

    sheet.define("accent", { color: [1, 0, 0, 1] });
    sheet.define("accent", { color: [0, 1, 0, 1] });
    expect(sheet.revision).toBe(2);

    expect(sheet.remove("missing")).toBe(false);
    expect(sheet.revision).toBe(2);
    expect(sheet.remove("accent")).toBe(true);
    expect(sheet.revision).toBe(3);
  });

  it("treats differently cased color names as unknown ids", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const sheet = new StyleSheet();

    expect(sheet.lookup("RED")).toEqual({ attributes: { RED: true } });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

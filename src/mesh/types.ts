/**
 * Mesh Types
 */

import type { AtlasSlot } from "../atlas/types";
import type { PositionedGlyph } from "../shaping/types";
import type { Color } from "../types/color";
import type { LineRun } from "./decorations";

/**
 * Value written into one component of a glyph's `uvB` channel.
 *
 * - `index`: emitted glyph index over glyph count, 0 to (N-1)/N
 * - `rawIndex`: emitted glyph index
 * - `lineProgress`: glyph centre over its line width
 * - `advance`: vertex x in em as if the text were one line
 * - `perGlyphAdvance`: glyph centre x in em as if the text were one line
 * - `rowX`, `colY`: vertex position within the block bounds, 0 to 1
 * - `magicNumber`: the glyph style's magic number
 */
export type GlyphMeta =
  | "index"
  | "rawIndex"
  | "lineProgress"
  | "advance"
  | "perGlyphAdvance"
  | "rowX"
  | "colY"
  | "magicNumber";

export type TextAlign = "left" | "center" | "right";

/** Block point placed at the origin, each axis from -0.5 (left/bottom) to 0.5 (right/top) */
export type TextAnchor = [number, number];

/** A shaped glyph with its atlas slot and quad rectangle in text space (pixels, y up) */
export interface MeshGlyph {
  glyph: PositionedGlyph;
  slot: AtlasSlot;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** An underline or strikethrough drawn with the atlas ink cell */
export interface MeshDecoration extends LineRun {
  slot: AtlasSlot;
}

export interface TextShadow {
  color: Color;
  /** Offset from the text in pixels, y up */
  offset: [number, number];
}

export interface MeshOptions {
  align: TextAlign;
  anchor: TextAnchor;
  /** Components of `uvB` */
  uvB: [GlyphMeta, GlyphMeta];
  /** Pixels per em for the `advance` metas */
  emSize: number;
  /** Copy of every quad drawn first, offset and recolored */
  shadow: TextShadow | null;
}

export const DEFAULT_MESH_OPTIONS: MeshOptions = {
  align: "left",
  anchor: [0, 0],
  uvB: ["index", "lineProgress"],
  emSize: 16,
  shadow: null,
};

export interface MeshBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Consecutive quads sampling the same atlas page */
export interface DrawBatch {
  page: number;
  indexStart: number;
  indexCount: number;
}

/**
 * Quads are emitted shadow first, then the text. Within each, glyphs come in
 * shaping order, followed by underlines and strikethroughs.
 */
export interface TextMesh {
  /** Interleaved vertices, see `VERTEX_ATTRIBUTES` */
  vertices: Float32Array;
  indices: Uint16Array | Uint32Array;
  vertexCount: number;
  quadCount: number;
  /** Extent of the text without its shadow */
  bounds: MeshBounds;
  batches: DrawBatch[];
}

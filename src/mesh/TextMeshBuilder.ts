/**
 * Text mesh builder.
 * Turns placed glyphs and decoration lines into an interleaved quad mesh. The
 * `uvB` channel feeds effect shaders.
 */

import type { UvRect } from "../atlas/types";
import type { PositionedGlyph, ShapedLine } from "../shaping/types";
import { isWhitespace } from "../shaping/whitespace";
import type { Color } from "../types/color";
import { LINE_MODES } from "./decorations";
import { appendQuad, packIndices, type QuadCorner } from "./quad";
import {
  DEFAULT_MESH_OPTIONS,
  type DrawBatch,
  type GlyphMeta,
  type MeshBounds,
  type MeshDecoration,
  type MeshGlyph,
  type MeshOptions,
  type TextAlign,
  type TextMesh,
} from "./types";

const ALIGN_FACTOR: Record<TextAlign, number> = {
  left: 0,
  center: 0.5,
  right: 1,
};

/** One quad before anchoring, in text space */
interface QuadInfo {
  glyph: PositionedGlyph;
  page: number;
  uv: UvRect;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  /** Horizontal shift from alignment */
  dx: number;
  /** Line start as if every line followed the previous one on a single row */
  runX: number;
  lineProgress: number;
  /** Value of the `index` metas */
  index: number;
}

export class TextMeshBuilder {
  /**
   * Build a mesh. One quad per visible glyph in input order, whitespace and
   * empty glyphs skipped, then one quad per decoration.
   */
  build(
    glyphs: readonly MeshGlyph[],
    lines: readonly ShapedLine[],
    options: Partial<MeshOptions> = {},
    decorations: readonly MeshDecoration[] = []
  ): TextMesh {
    const opts = { ...DEFAULT_MESH_OPTIONS, ...options };
    const factor = ALIGN_FACTOR[opts.align];

    let blockWidth = 0;
    const runStarts: number[] = [];
    let run = 0;
    for (const line of lines) {
      blockWidth = Math.max(blockWidth, line.width);
      runStarts.push(run);
      run += line.width;
    }

    const place = (glyph: PositionedGlyph, index: number): Pick<QuadInfo, "dx" | "runX" | "lineProgress" | "index"> => {
      const lineWidth = lines[glyph.line]?.width ?? 0;
      const centre = glyph.x + glyph.advance / 2;
      return {
        dx: (blockWidth - lineWidth) * factor,
        runX: runStarts[glyph.line] ?? 0,
        lineProgress: lineWidth > 0 ? Math.min(1, Math.max(0, centre / lineWidth)) : 0,
        index,
      };
    };

    const quads: QuadInfo[] = [];
    const glyphIndex = new Map<PositionedGlyph, number>();
    for (const item of glyphs) {
      if (item.slot.empty || isWhitespace(item.glyph.codePoint)) continue;
      if (!(item.x1 > item.x0 && item.y1 > item.y0)) continue;

      glyphIndex.set(item.glyph, quads.length);
      quads.push({
        glyph: item.glyph,
        page: item.slot.page,
        uv: item.slot.uv,
        x0: item.x0,
        y0: item.y0,
        x1: item.x1,
        y1: item.y1,
        ...place(item.glyph, quads.length),
      });
    }
    const glyphCount = quads.length;

    for (const mode of LINE_MODES) {
      for (const line of decorations) {
        if (line.mode !== mode || line.slot.empty || !(line.x1 > line.x0 && line.y1 > line.y0)) continue;
        quads.push({
          glyph: line.glyph,
          page: line.slot.page,
          uv: inkUv(line.slot.uv),
          x0: line.x0,
          y0: line.y0,
          x1: line.x1,
          y1: line.y1,
          ...place(line.glyph, glyphIndex.get(line.glyph) ?? 0),
        });
      }
    }

    if (quads.length === 0) {
      return {
        vertices: new Float32Array(0),
        indices: new Uint16Array(0),
        vertexCount: 0,
        quadCount: 0,
        bounds: { minX: 0, minY: 0, maxX: 0, maxY: 0 },
        batches: [],
      };
    }

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const quad of quads) {
      minX = Math.min(minX, quad.x0 + quad.dx);
      maxX = Math.max(maxX, quad.x1 + quad.dx);
      minY = Math.min(minY, quad.y0);
      maxY = Math.max(maxY, quad.y1);
    }

    const [anchorX, anchorY] = opts.anchor;
    const width = maxX - minX;
    const height = maxY - minY;
    const offsetX = -((minX + maxX) / 2 + anchorX * width);
    const offsetY = -((minY + maxY) / 2 + anchorY * height);
    const bounds: MeshBounds = {
      minX: minX + offsetX,
      minY: minY + offsetY,
      maxX: maxX + offsetX,
      maxY: maxY + offsetY,
    };

    const vertices: number[] = [];
    const indices: number[] = [];
    const batches: DrawBatch[] = [];
    let vertexCount = 0;

    const layers: { dx: number; dy: number; color: Color | null }[] = [];
    if (opts.shadow) {
      const [dx, dy] = opts.shadow.offset;
      layers.push({ dx, dy, color: opts.shadow.color });
    }
    layers.push({ dx: 0, dy: 0, color: null });

    for (const layer of layers) {
      for (const quad of quads) {
        const { uv } = quad;
        const x0 = quad.x0 + quad.dx + offsetX;
        const x1 = quad.x1 + quad.dx + offsetX;
        const y0 = quad.y0 + offsetY;
        const y1 = quad.y1 + offsetY;
        // Shadow quads carry the metas of the quad they copy
        const localX = [quad.x0, quad.x1, quad.x0, quad.x1];
        const positions: [number, number][] = [
          [x0, y0],
          [x1, y0],
          [x0, y1],
          [x1, y1],
        ];
        const uvB = positions.map(([x, y], corner): [number, number] => [
          metaValue(opts.uvB[0], quad, glyphCount, x, y, localX[corner] ?? 0, bounds, opts.emSize),
          metaValue(opts.uvB[1], quad, glyphCount, x, y, localX[corner] ?? 0, bounds, opts.emSize),
        ]);

        const sx0 = x0 + layer.dx;
        const sx1 = x1 + layer.dx;
        const sy0 = y0 + layer.dy;
        const sy1 = y1 + layer.dy;
        const corners: QuadCorner[] = [
          [sx0, sy0, uv.u0, uv.v1],
          [sx1, sy0, uv.u1, uv.v1],
          [sx0, sy1, uv.u0, uv.v0],
          [sx1, sy1, uv.u1, uv.v0],
        ];

        const last = batches[batches.length - 1];
        if (last && last.page === quad.page) {
          last.indexCount += 6;
        } else {
          batches.push({ page: quad.page, indexStart: indices.length, indexCount: 6 });
        }

        vertexCount = appendQuad(vertices, indices, corners, uvB, layer.color ?? quad.glyph.style.color, vertexCount);
      }
    }

    return {
      vertices: new Float32Array(vertices),
      indices: packIndices(indices, vertexCount),
      vertexCount,
      quadCount: quads.length * layers.length,
      bounds,
      batches,
    };
  }
}

/** The centre of a cell at every corner */
function inkUv(uv: UvRect): UvRect {
  const u = (uv.u0 + uv.u1) / 2;
  const v = (uv.v0 + uv.v1) / 2;
  return { u0: u, v0: v, u1: u, v1: v };
}

function metaValue(
  meta: GlyphMeta,
  quad: QuadInfo,
  count: number,
  x: number,
  y: number,
  localX: number,
  bounds: MeshBounds,
  emSize: number
): number {
  const glyph = quad.glyph;
  switch (meta) {
    case "index":
      return count > 0 ? quad.index / count : 0;
    case "rawIndex":
      return quad.index;
    case "lineProgress":
      return quad.lineProgress;
    case "advance":
      return (quad.runX + localX) / emSize;
    case "perGlyphAdvance":
      return (quad.runX + glyph.x + glyph.advance / 2) / emSize;
    case "rowX":
      return bounds.maxX > bounds.minX ? (x - bounds.minX) / (bounds.maxX - bounds.minX) : 0;
    case "colY":
      return bounds.maxY > bounds.minY ? (y - bounds.minY) / (bounds.maxY - bounds.minY) : 0;
    case "magicNumber":
      return glyph.style.magicNumber;
  }
}

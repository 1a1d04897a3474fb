import type { Color } from "../types/color";

/** Local corner: x, y, u, v */
export type QuadCorner = [number, number, number, number];

export interface VertexAttribute {
  name: "position" | "uv" | "uvB" | "color";
  location: number;
  /** Float components */
  size: number;
  stride: number;
  offset: number;
}

export const VERTEX_FLOATS = 11;
export const VERTEX_STRIDE_BYTES = VERTEX_FLOATS * 4;

export const VERTEX_ATTRIBUTES: readonly VertexAttribute[] = [
  { name: "position", location: 0, size: 3, stride: VERTEX_STRIDE_BYTES, offset: 0 },
  { name: "uv", location: 1, size: 2, stride: VERTEX_STRIDE_BYTES, offset: 12 },
  { name: "uvB", location: 2, size: 2, stride: VERTEX_STRIDE_BYTES, offset: 20 },
  { name: "color", location: 3, size: 4, stride: VERTEX_STRIDE_BYTES, offset: 28 },
];

/**
 * Append one quad. Corners go bottom-left, bottom-right, top-left, top-right;
 * triangles (0,1,2) and (1,3,2) face the viewer in a y-up frame.
 *
 * `uvB` holds one [x, y] pair per corner.
 */
export function appendQuad(
  vertices: number[],
  indices: number[],
  corners: readonly QuadCorner[],
  uvB: readonly (readonly [number, number])[],
  color: Color,
  vertexCount: number
): number {
  const [r, g, b, a] = color;

  corners.forEach(([x, y, u, v], i) => {
    const [bx, by] = uvB[i] ?? [0, 0];
    vertices.push(x, y, 0, u, v, bx, by, r, g, b, a);
  });

  indices.push(
    vertexCount, vertexCount + 1, vertexCount + 2,
    vertexCount + 1, vertexCount + 3, vertexCount + 2
  );

  return vertexCount + 4;
}

/** Smallest index array type that can address `vertexCount` vertices */
export function packIndices(indices: readonly number[], vertexCount: number): Uint16Array | Uint32Array {
  return vertexCount > 65536 ? new Uint32Array(indices) : new Uint16Array(indices);
}

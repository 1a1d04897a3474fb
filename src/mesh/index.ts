export { TextMeshBuilder } from "./TextMeshBuilder";
export {
  INK_KEY,
  LINE_MODES,
  collectLineRuns,
  inkBitmap,
  lineMetrics,
  type LineMode,
  type LineRun,
} from "./decorations";
export {
  VERTEX_ATTRIBUTES,
  VERTEX_FLOATS,
  VERTEX_STRIDE_BYTES,
  appendQuad,
  packIndices,
  type QuadCorner,
  type VertexAttribute,
} from "./quad";
export {
  DEFAULT_MESH_OPTIONS,
  type DrawBatch,
  type GlyphMeta,
  type MeshBounds,
  type MeshDecoration,
  type MeshGlyph,
  type MeshOptions,
  type TextAlign,
  type TextAnchor,
  type TextMesh,
  type TextShadow,
} from "./types";

/**
 * glyphmesh - Rich text markup to SDF glyph atlases and quad meshes
 */

export const VERSION = "0.1.0";

export {
  TextPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  type PipelineOptions,
  type PipelineServices,
  type TextPipelineConfig,
  type PrepareJob,
  type TextProgressCallback,
} from "./TextPipeline";
export { Text3d, type Text3dOptions, type Text3dUpdate } from "./Text3d";

// Rich text
export * from "./richtext";

// Placeholder values
export * from "./fetch";

// Styles
export * from "./style";

// Shaping
export * from "./shaping";

// Distance fields
export * from "./sdf";

// Atlas
export * from "./atlas";

// Mesh
export * from "./mesh";

// Types
export { WHITE, type Color } from "./types/color";

/**
 * Text Pipeline
 *
 * Owns the shared services and turns resolved runs into a quad mesh whose
 * glyphs live in the atlas.
 */

import { GlyphAtlas } from "./atlas/GlyphAtlas";
import type { AtlasKey, AtlasOptions, AtlasSlot } from "./atlas/types";
import type { ResolvedRun } from "./fetch/types";
import { INK_KEY, LINE_MODES, collectLineRuns, inkBitmap } from "./mesh/decorations";
import { TextMeshBuilder } from "./mesh/TextMeshBuilder";
import type { MeshDecoration, MeshGlyph, TextMesh } from "./mesh/types";
import { rasterizeGlyph } from "./sdf/rasterizeGlyph";
import { DEFAULT_SDF_OPTIONS, type SdfOptions } from "./sdf/types";
import { BasicShaper } from "./shaping/BasicShaper";
import { FontLibrary } from "./shaping/FontLibrary";
import type { PositionedGlyph, ShapedText, ShapingEngine, StyledRun } from "./shaping/types";
import { isWhitespace } from "./shaping/whitespace";
import { StyleSheet } from "./style/StyleSheet";
import { DEFAULT_TEXT3D_STYLING, baseTextStyle, type Text3dStyling } from "./style/styling";
import { applySegmentStyle } from "./style/types";

export interface PipelineOptions {
  /** Physical pixels per logical pixel; glyphs rasterize at `size * scaleFactor` */
  scaleFactor: number;
  /** Horizontal subpixel positions cached per glyph, 1 disables subpixel placement */
  subpixelBuckets: number;
  /** Raster sizes are rounded to multiples of this many pixels */
  sizeStep: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  scaleFactor: 1,
  subpixelBuckets: 1,
  sizeStep: 1,
};

export interface PipelineServices {
  atlas: GlyphAtlas;
  fonts: FontLibrary;
  shaper: ShapingEngine;
  styles: StyleSheet;
}

export interface TextPipelineConfig extends Partial<PipelineServices>, Partial<PipelineOptions> {
  /** Options for the atlas created when none is given */
  atlasOptions?: Partial<AtlasOptions>;
  sdf?: Partial<SdfOptions>;
}

/** Text and styling to rasterize ahead of time */
export interface PrepareJob {
  /** Plain text, no markup */
  text: string;
  styling?: Partial<Text3dStyling>;
}

/** Progress hooks for `prepare`, e.g. for a loading screen */
export interface TextProgressCallback {
  glyphDrawn?(): void;
  jobDrawn?(): void;
}

export class TextPipeline {
  readonly atlas: GlyphAtlas;
  readonly fonts: FontLibrary;
  readonly shaper: ShapingEngine;
  readonly styles: StyleSheet;
  readonly sdf: SdfOptions;

  private options: PipelineOptions;
  private builder = new TextMeshBuilder();

  constructor(config: TextPipelineConfig = {}) {
    this.fonts = config.fonts ?? new FontLibrary();
    this.atlas = config.atlas ?? new GlyphAtlas(config.atlasOptions);
    this.shaper = config.shaper ?? new BasicShaper(this.fonts);
    this.styles = config.styles ?? new StyleSheet();
    this.sdf = { ...DEFAULT_SDF_OPTIONS, ...config.sdf };
    this.options = {
      scaleFactor: config.scaleFactor ?? DEFAULT_PIPELINE_OPTIONS.scaleFactor,
      subpixelBuckets: config.subpixelBuckets ?? DEFAULT_PIPELINE_OPTIONS.subpixelBuckets,
      sizeStep: config.sizeStep ?? DEFAULT_PIPELINE_OPTIONS.sizeStep,
    };

    if (!(this.sdf.margin > 0)) {
      throw new Error(`SDF margin must be positive, got ${this.sdf.margin}`);
    }
    validateScaleFactor(this.options.scaleFactor);
    if (!Number.isInteger(this.options.subpixelBuckets) || this.options.subpixelBuckets < 1) {
      throw new Error(`subpixelBuckets must be a positive integer, got ${this.options.subpixelBuckets}`);
    }
    if (!(this.options.sizeStep > 0)) {
      throw new Error(`sizeStep must be positive, got ${this.options.sizeStep}`);
    }
  }

  get scaleFactor(): number {
    return this.options.scaleFactor;
  }

  /** Change the scale factor. Cached glyphs are dropped when it changes. */
  setScaleFactor(scaleFactor: number): void {
    validateScaleFactor(scaleFactor);
    if (scaleFactor === this.options.scaleFactor) return;
    this.options.scaleFactor = scaleFactor;
    this.atlas.clear();
  }

  /** Apply styles to resolved runs and shape them. */
  shape(runs: readonly ResolvedRun[], styling: Text3dStyling): ShapedText {
    const base = baseTextStyle(styling);
    const styled: StyledRun[] = runs.map((run) => ({
      text: run.text,
      style: applySegmentStyle(base, this.styles.resolve(run.styles)),
    }));
    return this.shaper.shape(styled, {
      maxWidth: styling.maxWidth,
      lineHeight: styling.lineHeight,
      tabWidth: styling.tabWidth,
    });
  }

  /**
   * Render resolved runs into a mesh. Starts a new atlas pass, so every glyph
   * of this mesh stays resident until the next render.
   */
  render(runs: readonly ResolvedRun[], styling: Text3dStyling = DEFAULT_TEXT3D_STYLING): TextMesh {
    const shaped = this.shape(runs, styling);
    this.atlas.beginPass();

    const glyphs: MeshGlyph[] = [];
    for (const glyph of shaped.glyphs) {
      if (isWhitespace(glyph.codePoint)) continue;
      glyphs.push(this.place(glyph));
    }

    const decorations: MeshDecoration[] = [];
    for (const mode of LINE_MODES) {
      for (const run of collectLineRuns(shaped.glyphs, mode)) {
        decorations.push({ ...run, slot: this.atlas.getOrInsert(INK_KEY, inkBitmap) });
      }
    }

    return this.builder.build(
      glyphs,
      shaped.lines,
      {
        align: styling.align,
        anchor: styling.anchor,
        uvB: styling.uvB,
        emSize: styling.size,
        shadow: styling.shadow,
      },
      decorations
    );
  }

  /** Rasterize the glyphs of each job into the atlas without building meshes. */
  prepare(jobs: Iterable<PrepareJob>, progress: TextProgressCallback = {}): void {
    this.atlas.beginPass();
    for (const job of jobs) {
      const styling = { ...DEFAULT_TEXT3D_STYLING, ...job.styling };
      const shaped = this.shape([{ styles: [], text: job.text }], styling);
      for (const glyph of shaped.glyphs) {
        if (!isWhitespace(glyph.codePoint)) {
          this.place(glyph);
        }
        progress.glyphDrawn?.();
      }
      progress.jobDrawn?.();
    }
  }

  /** Resolve a glyph's atlas slot and its quad in text space. */
  private place(glyph: PositionedGlyph): MeshGlyph {
    const { scaleFactor, subpixelBuckets } = this.options;
    const pixels = glyph.fontSize * scaleFactor;
    const size = this.quantizeSize(pixels);

    const penX = glyph.x * scaleFactor;
    const originX = subpixelBuckets > 1 ? Math.floor(penX) : penX;
    const subpixel = subpixelBuckets > 1 ? Math.min(subpixelBuckets - 1, Math.floor((penX - originX) * subpixelBuckets)) : 0;

    const key: AtlasKey = { fontId: glyph.face.id, glyphId: glyph.glyphId, size, subpixel };
    const slot: AtlasSlot = this.atlas.getOrInsert(key, () =>
      rasterizeGlyph(glyph.face.outline(glyph.glyphId), glyph.face.unitsPerEm, size, {
        ...this.sdf,
        offsetX: subpixel / subpixelBuckets,
      })
    );

    // Raster pixels to logical pixels
    const factor = pixels / size / scaleFactor;
    const x0 = originX / scaleFactor + slot.left * factor;
    const y1 = glyph.y + slot.top * factor;
    return {
      glyph,
      slot,
      x0,
      y0: y1 - slot.rect.height * factor,
      x1: x0 + slot.rect.width * factor,
      y1,
    };
  }

  private quantizeSize(pixels: number): number {
    const step = this.options.sizeStep;
    return Math.max(step, Math.round(pixels / step) * step);
  }
}

function validateScaleFactor(scaleFactor: number): void {
  if (!(scaleFactor > 0) || !Number.isFinite(scaleFactor)) {
    throw new Error(`scaleFactor must be a positive number, got ${scaleFactor}`);
  }
}

/**
 * Text3d
 *
 * One rich text object bound to a source of placeholder values. Rebuilds its
 * mesh only when something it depends on changed.
 */

import { FetchResolver } from "./fetch/FetchResolver";
import { EMPTY_FETCH_SOURCE } from "./fetch/sources";
import type { FetchSource } from "./fetch/types";
import type { TextMesh } from "./mesh/types";
import { parseRichText } from "./richtext/parse";
import type { RichText } from "./richtext/types";
import { DEFAULT_TEXT3D_STYLING, type Text3dStyling } from "./style/styling";
import type { TextPipeline } from "./TextPipeline";

export interface Text3dOptions {
  styling?: Partial<Text3dStyling>;
  source?: FetchSource;
}

export interface Text3dUpdate {
  mesh: TextMesh;
  /** False when the previous mesh was returned unchanged */
  changed: boolean;
}

export class Text3d {
  private pipeline: TextPipeline;
  private tree: RichText;
  private _styling: Text3dStyling;
  private source: FetchSource;
  private resolver = new FetchResolver();

  private mesh: TextMesh | null = null;
  private dirty = true;
  /** Atlas, style sheet and font library revisions of the current mesh */
  private revisions: [number, number, number] = [-1, -1, -1];

  constructor(pipeline: TextPipeline, template: string | RichText = "", options: Text3dOptions = {}) {
    this.pipeline = pipeline;
    this.tree = typeof template === "string" ? parseRichText(template) : template;
    this._styling = { ...DEFAULT_TEXT3D_STYLING, ...options.styling };
    this.source = options.source ?? EMPTY_FETCH_SOURCE;
  }

  get template(): RichText {
    return this.tree;
  }

  get styling(): Readonly<Text3dStyling> {
    return this._styling;
  }

  /** Last built mesh, null before the first update */
  get currentMesh(): TextMesh | null {
    return this.mesh;
  }

  /** Replace the template with markup or a parsed tree. */
  setTemplate(template: string | RichText): void {
    this.tree = typeof template === "string" ? parseRichText(template) : template;
    this.dirty = true;
  }

  /** Override styling fields; unspecified fields keep their values. */
  setStyling(styling: Partial<Text3dStyling>): void {
    this._styling = { ...this._styling, ...styling };
    this.dirty = true;
  }

  setSource(source: FetchSource): void {
    this.source = source;
    this.resolver.reset();
    this.dirty = true;
  }

  /**
   * Resolve placeholders and rebuild the mesh if the template or styling,
   * the fetched values, or the shared atlas, styles or fonts changed since the
   * last update.
   */
  update(): Text3dUpdate {
    const resolved = this.resolver.resolve(this.tree, this.source);
    const revisions = this.currentRevisions();
    if (this.mesh && !this.dirty && !resolved.changed && sameRevisions(this.revisions, revisions)) {
      return { mesh: this.mesh, changed: false };
    }

    const mesh = this.pipeline.render(resolved.runs, this._styling);
    this.mesh = mesh;
    this.dirty = false;
    // Rendering can evict glyphs, so read the revisions again
    this.revisions = this.currentRevisions();
    return { mesh, changed: true };
  }

  private currentRevisions(): [number, number, number] {
    const { atlas, styles, fonts } = this.pipeline;
    return [atlas.revision, styles.revision, fonts.revision];
  }
}

function sameRevisions(a: readonly number[], b: readonly number[]): boolean {
  return a.every((value, i) => value === b[i]);
}

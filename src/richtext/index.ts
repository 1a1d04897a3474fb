export { parseRichText } from "./parse";
export {
  flattenSegments,
  placeholderNames,
  toPlainText,
  toMarkup,
  escapeMarkup,
} from "./segments";
export type {
  StyleId,
  Segment,
  LeafSegment,
  LiteralSegment,
  PlaceholderSegment,
  StyleScope,
  RichText,
} from "./types";

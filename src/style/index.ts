export { StyleSheet } from "./StyleSheet";
export { parseColor } from "./colors";
export {
  FontWeight,
  joinStyles,
  applySegmentStyle,
  type SegmentStyle,
  type TextStyle,
  type StyleAttributeValue,
} from "./types";
export { DEFAULT_TEXT3D_STYLING, baseTextStyle, type Text3dStyling } from "./styling";

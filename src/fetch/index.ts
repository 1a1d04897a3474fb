export { FetchResolver } from "./FetchResolver";
export { FetchStore } from "./FetchStore";
export {
  fetchFromMap,
  fetchFromRecord,
  fetchFromFunction,
  EMPTY_FETCH_SOURCE,
} from "./sources";
export type { FetchSource, ResolvedRun, ResolvedText } from "./types";

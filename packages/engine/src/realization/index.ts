export {
  ProgressionRealizer,
  type ProgressionRealizerConfig,
  type RealizationResult,
} from "./ProgressionRealizer";
export { NoValidVoicingError } from "./NoValidVoicingError";
export { SCORE_TOLERANCE, selectBest } from "./selectBest";

export {
  pitchName,
  pitchClassName,
  formatVoicing,
  parseNoteName,
  parsePitchClassName,
} from "./pitchNames";

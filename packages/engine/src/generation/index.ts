export {
  candidatePitches,
  enumerateVoicings,
  generateVoicings,
} from "./VoicingGenerator";
export {
  MAX_UPPER_VOICE_GAP,
  isNonCrossing,
  hasBoundedUpperSpacing,
  coversChordTones,
  isStructurallyValid,
} from "./constraints";

export {
  analyzeRealization,
  checkVoicing,
  totalVoiceMotion,
  type RealizationAnalysis,
  type VoicingIssue,
} from "./VoiceLeadingAnalysis";

export {
  scoreVoicing,
  scoreVoicingTerms,
  createVoicingScorer,
  doublingScore,
  spacingScore,
  rangeComfortScore,
  parallelMotionPenalty,
  voiceMotionScore,
  contraryMotionBonus,
  upperVoiceMotion,
  iterateParallelMotions,
  findParallelMotions,
  DEFAULT_SCORING_WEIGHTS,
  type ScoringWeights,
  type ScoringOptions,
} from "./VoicingScorer";

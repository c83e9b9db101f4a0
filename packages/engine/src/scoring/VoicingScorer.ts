/**
 * Voicing Scorer
 *
 * Rates a candidate voicing with classical voice-leading heuristics.
 * Terms are additive and unnormalized; only the ordering of scores
 * between candidates of the same chord matters.
 *
 * ## Static terms (candidate alone)
 *
 * - **doubling**: reward each voice sounding the root's pitch class
 * - **spacing**: penalize upper-voice gaps wider than a fifth
 * - **range comfort**: penalize distance of S/A/T from their range midpoints
 *
 * ## Transition terms (only with a previous voicing)
 *
 * - **parallel motion**: flat penalty for parallel fifths/octaves
 * - **voice motion**: penalize total S/A/T movement (favors common tones)
 * - **contrary motion**: reward soprano and bass moving in opposite directions
 *
 * The "root" handed in by the realizer is the chord's bass pitch, so for
 * inverted chords the doubling term rewards doubling the bass note.
 *
 * @see VoicingScorer for the scorer contract
 */

import type {
  ParallelMotion,
  Pitch,
  ScoreBreakdown,
  VoicePart,
  VoiceRanges,
  Voicing,
  VoicingScorer,
} from "@continuo/contracts";
import {
  DEFAULT_VOICE_RANGES,
  UPPER_VOICE_PARTS,
  VOICE_PARTS,
  rangeMidpoint,
} from "@continuo/contracts";

/**
 * Weights for each scoring term.
 */
export interface ScoringWeights {
  /** Added per voice sounding the root's pitch class. @default 10 */
  rootDoubling: number;

  /** Upper-voice gap (semitones) tolerated before spacing is penalized. @default 7 */
  spacingThreshold: number;

  /** Subtracted per semitone of gap above the threshold. @default 2 */
  spacingPenalty: number;

  /** Subtracted per semitone an upper voice sits away from its range midpoint. @default 0.1 */
  rangeComfort: number;

  /** Applied once when any parallel fifth or octave is found. @default -1000 */
  parallelPenalty: number;

  /** Subtracted per semitone of combined soprano/alto/tenor motion. @default 0.5 */
  voiceMotion: number;

  /** Added when soprano and bass move in opposite directions. @default 5 */
  contraryMotionBonus: number;
}

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  rootDoubling: 10,
  spacingThreshold: 7,
  spacingPenalty: 2,
  rangeComfort: 0.1,
  parallelPenalty: -1000,
  voiceMotion: 0.5,
  contraryMotionBonus: 5,
});

/**
 * Configuration for the scorer.
 */
export interface ScoringOptions {
  /** Ranges whose midpoints drive the comfort term. @default DEFAULT_VOICE_RANGES */
  ranges?: VoiceRanges;

  /** Partial overrides of DEFAULT_SCORING_WEIGHTS. */
  weights?: Partial<ScoringWeights>;
}

interface ResolvedScoringOptions {
  ranges: VoiceRanges;
  weights: ScoringWeights;
}

/** Intervals that must not move in parallel: perfect fifth and octave. */
const PERFECT_INTERVALS: ReadonlySet<number> = new Set([7, 12]);

// ============================================================================
// Static Terms
// ============================================================================

export function doublingScore(
  voicing: Voicing,
  root: Pitch,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  let score = 0;
  for (const part of VOICE_PARTS) {
    if (voicing[part].pc === root.pc) {
      score += weights.rootDoubling;
    }
  }
  return score;
}

export function spacingScore(
  voicing: Voicing,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const gaps = [
    voicing.soprano.midi - voicing.alto.midi,
    voicing.alto.midi - voicing.tenor.midi,
  ];

  let score = 0;
  for (const gap of gaps) {
    if (gap > weights.spacingThreshold) {
      score -= (gap - weights.spacingThreshold) * weights.spacingPenalty;
    }
  }
  return score;
}

export function rangeComfortScore(
  voicing: Voicing,
  ranges: VoiceRanges = DEFAULT_VOICE_RANGES,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  let distance = 0;
  for (const part of UPPER_VOICE_PARTS) {
    distance += Math.abs(voicing[part].midi - rangeMidpoint(ranges[part]));
  }
  return -(distance * weights.rangeComfort);
}

// ============================================================================
// Transition Terms
// ============================================================================

/**
 * Yields each voice pair that moves in parallel fifths or octaves from
 * `previous` to `next`, in pair order (soprano-alto, soprano-tenor, ...,
 * tenor-bass).
 *
 * Intervals are absolute semitone distances, so a twelfth (19) is not
 * a fifth and a double octave (24) is not an octave.
 */
export function* iterateParallelMotions(
  previous: Voicing,
  next: Voicing
): Generator<ParallelMotion> {
  for (let i = 0; i < VOICE_PARTS.length; i++) {
    for (let j = i + 1; j < VOICE_PARTS.length; j++) {
      const upper = VOICE_PARTS[i];
      const lower = VOICE_PARTS[j];

      const before = Math.abs(previous[upper].midi - previous[lower].midi);
      const after = Math.abs(next[upper].midi - next[lower].midi);
      if (before !== after || !PERFECT_INTERVALS.has(before)) continue;

      const upperMotion = next[upper].midi - previous[upper].midi;
      const lowerMotion = next[lower].midi - previous[lower].midi;
      if (
        upperMotion !== 0 &&
        lowerMotion !== 0 &&
        Math.sign(upperMotion) === Math.sign(lowerMotion)
      ) {
        yield { upper, lower, interval: before === 7 ? 7 : 12 };
      }
    }
  }
}

export function findParallelMotions(
  previous: Voicing,
  next: Voicing
): ParallelMotion[] {
  return [...iterateParallelMotions(previous, next)];
}

/**
 * Flat penalty if any pair moves in parallel. Stops at the first match;
 * several violations cost the same as one.
 */
export function parallelMotionPenalty(
  previous: Voicing,
  next: Voicing,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const first = iterateParallelMotions(previous, next).next();
  return first.done ? 0 : weights.parallelPenalty;
}

/**
 * Combined absolute soprano, alto and tenor motion in semitones.
 * Bass motion is fixed by the input, so it is left out.
 */
export function upperVoiceMotion(previous: Voicing, next: Voicing): number {
  let motion = 0;
  for (const part of UPPER_VOICE_PARTS) {
    motion += Math.abs(next[part].midi - previous[part].midi);
  }
  return motion;
}

export function voiceMotionScore(
  previous: Voicing,
  next: Voicing,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  return -(upperVoiceMotion(previous, next) * weights.voiceMotion);
}

export function contraryMotionBonus(
  previous: Voicing,
  next: Voicing,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const sopranoMotion = motionOf("soprano", previous, next);
  const bassMotion = motionOf("bass", previous, next);

  if (
    sopranoMotion !== 0 &&
    bassMotion !== 0 &&
    Math.sign(sopranoMotion) !== Math.sign(bassMotion)
  ) {
    return weights.contraryMotionBonus;
  }
  return 0;
}

function motionOf(part: VoicePart, previous: Voicing, next: Voicing): number {
  return next[part].midi - previous[part].midi;
}

// ============================================================================
// Total Score
// ============================================================================

/**
 * Score a candidate term by term.
 */
export function scoreVoicingTerms(
  candidate: Voicing,
  previous: Voicing | null,
  root: Pitch,
  options: ScoringOptions = {}
): ScoreBreakdown {
  const { ranges, weights } = resolveOptions(options);

  const doubling = doublingScore(candidate, root, weights);
  const spacing = spacingScore(candidate, weights);
  const rangeComfort = rangeComfortScore(candidate, ranges, weights);

  let parallelMotion = 0;
  let voiceMotion = 0;
  let contraryMotion = 0;
  if (previous) {
    parallelMotion = parallelMotionPenalty(previous, candidate, weights);
    voiceMotion = voiceMotionScore(previous, candidate, weights);
    contraryMotion = contraryMotionBonus(previous, candidate, weights);
  }

  return {
    doubling,
    spacing,
    rangeComfort,
    parallelMotion,
    voiceMotion,
    contraryMotion,
    total:
      doubling +
      spacing +
      rangeComfort +
      parallelMotion +
      voiceMotion +
      contraryMotion,
  };
}

/**
 * Score a candidate. Higher is better.
 */
export function scoreVoicing(
  candidate: Voicing,
  previous: Voicing | null,
  root: Pitch,
  options: ScoringOptions = {}
): number {
  return scoreVoicingTerms(candidate, previous, root, options).total;
}

/**
 * Bind ranges and weights into a `VoicingScorer`.
 */
export function createVoicingScorer(options: ScoringOptions = {}): VoicingScorer {
  const resolved = resolveOptions(options);
  return (candidate, previous, root) =>
    scoreVoicingTerms(candidate, previous, root, resolved).total;
}

function resolveOptions(options: ScoringOptions): ResolvedScoringOptions {
  return {
    ranges: options.ranges ?? DEFAULT_VOICE_RANGES,
    weights: { ...DEFAULT_SCORING_WEIGHTS, ...options.weights },
  };
}

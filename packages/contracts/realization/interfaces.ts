/**
 * Realization Interfaces
 *
 * Contracts shared between the voicing scorer, the progression realizer
 * and anything that reports on a realization.
 */

import type { Pitch } from "../pitch/pitch";
import type { Voicing, VoicePart } from "../voicing/voicing";

// ============================================================================
// Scoring
// ============================================================================

/**
 * Scores one candidate voicing. Higher is better; the scale is unbounded.
 *
 * Must be pure: the realizer may evaluate candidates in any order and
 * relies on the same inputs always producing the same score.
 *
 * `previous` is null for the first chord of a progression.
 */
export type VoicingScorer = (
  candidate: Voicing,
  previous: Voicing | null,
  root: Pitch
) => number;

/**
 * Per-term contributions of a score. `total` is their sum.
 * Transition terms are 0 when there is no previous voicing.
 */
export interface ScoreBreakdown {
  doubling: number;
  spacing: number;
  rangeComfort: number;
  parallelMotion: number;
  voiceMotion: number;
  contraryMotion: number;
  total: number;
}

/**
 * Two voices holding a perfect fifth or octave into the next chord while
 * moving the same way.
 */
export interface ParallelMotion {
  upper: VoicePart;
  lower: VoicePart;
  /** 7 (perfect fifth) or 12 (octave) */
  interval: 7 | 12;
}

// ============================================================================
// Realization
// ============================================================================

/**
 * The outcome for one chord of a successful realization.
 */
export interface RealizedChord {
  /** 0-based position in the progression */
  index: number;

  voicing: Voicing;

  /** Score of the selected voicing */
  score: number;

  /** Number of structurally valid candidates considered */
  candidateCount: number;
}

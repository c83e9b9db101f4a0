/**
 * Progression Realizer
 *
 * Turns a progression into one voicing per chord, greedily:
 *
 *   for each chord: generate → score against previous → pick best → carry forward
 *
 * The previous selection feeds the transition terms of the next chord's
 * scores, so chords are processed strictly in order. Within a chord the
 * candidates are independent; ties go to the earliest candidate in
 * generation order.
 *
 * A chord with no valid candidates ends the realization with a
 * NoValidVoicingError. Nothing partial is returned since every later
 * choice depends on the missing one.
 */

import type {
  Progression,
  RealizedChord,
  VoiceRanges,
  Voicing,
  VoicingScorer,
} from "@continuo/contracts";
import { DEFAULT_VOICE_RANGES } from "@continuo/contracts";
import { generateVoicings } from "../generation/VoicingGenerator";
import {
  createVoicingScorer,
  type ScoringWeights,
} from "../scoring/VoicingScorer";
import { NoValidVoicingError } from "./NoValidVoicingError";
import { selectBest } from "./selectBest";

/**
 * Configuration for the ProgressionRealizer.
 */
export interface ProgressionRealizerConfig {
  /**
   * Inclusive range per voice.
   * @default DEFAULT_VOICE_RANGES
   */
  ranges?: VoiceRanges;

  /**
   * Overrides for the default scorer's weights. Ignored when `scorer` is set.
   */
  weights?: Partial<ScoringWeights>;

  /**
   * Replaces the default heuristic scorer.
   */
  scorer?: VoicingScorer;

  /**
   * Log each chord's candidate count and selection.
   * @default false
   */
  verbose?: boolean;
}

export type RealizationResult =
  | { success: true; voicings: Voicing[]; steps: RealizedChord[] }
  | { success: false; error: NoValidVoicingError };

export class ProgressionRealizer {
  readonly id = "progression-realizer";

  private ranges: VoiceRanges;
  private scorer: VoicingScorer;
  private verbose: boolean;

  constructor(config: ProgressionRealizerConfig = {}) {
    this.ranges = config.ranges ?? DEFAULT_VOICE_RANGES;
    this.scorer =
      config.scorer ??
      createVoicingScorer({ ranges: this.ranges, weights: config.weights });
    this.verbose = config.verbose ?? false;
  }

  realize(progression: Progression): RealizationResult {
    const steps: RealizedChord[] = [];
    let previous: Voicing | null = null;

    for (let index = 0; index < progression.length; index++) {
      const chord = progression[index];
      const candidates = generateVoicings(chord, this.ranges);

      const prior = previous;
      const best = selectBest(candidates, (candidate): number =>
        this.scorer(candidate, prior, chord.bass)
      );

      if (best === null) {
        this.log(`chord ${index}: no valid voicing`);
        return { success: false, error: new NoValidVoicingError(index) };
      }

      this.log(
        `chord ${index}: ${candidates.length} candidates, best score ${best.score.toFixed(2)}`
      );

      steps.push({
        index,
        voicing: best.item,
        score: best.score,
        candidateCount: candidates.length,
      });
      previous = best.item;
    }

    return {
      success: true,
      voicings: steps.map((step) => step.voicing),
      steps,
    };
  }

  /**
   * Like `realize`, but throws the NoValidVoicingError instead of
   * returning it.
   */
  realizeOrThrow(progression: Progression): Voicing[] {
    const result = this.realize(progression);
    if (!result.success) {
      throw result.error;
    }
    return result.voicings;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[ProgressionRealizer] ${message}`);
    }
  }
}

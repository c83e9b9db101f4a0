/**
 * Structural constraints on a single voicing.
 *
 * Shared by the generator (as its filter) and by analysis (to report
 * which constraint a voicing breaks).
 */

import type { PitchClass, Voicing } from "@continuo/contracts";
import { voicingPitches } from "@continuo/contracts";

/** Widest allowed gap between adjacent upper voices (one octave). */
export const MAX_UPPER_VOICE_GAP = 12;

/**
 * soprano >= alto >= tenor >= bass. Unisons are allowed.
 */
export function isNonCrossing(voicing: Voicing): boolean {
  return (
    voicing.soprano.midi >= voicing.alto.midi &&
    voicing.alto.midi >= voicing.tenor.midi &&
    voicing.tenor.midi >= voicing.bass.midi
  );
}

/**
 * Soprano-alto and alto-tenor gaps stay within an octave.
 * Tenor-bass spacing is unconstrained.
 */
export function hasBoundedUpperSpacing(voicing: Voicing): boolean {
  return (
    voicing.soprano.midi - voicing.alto.midi <= MAX_UPPER_VOICE_GAP &&
    voicing.alto.midi - voicing.tenor.midi <= MAX_UPPER_VOICE_GAP
  );
}

/**
 * Every chord tone appears in at least one voice, bass included.
 */
export function coversChordTones(
  voicing: Voicing,
  chordTones: readonly PitchClass[]
): boolean {
  const present = new Set(voicingPitches(voicing).map((p) => p.pc));
  return chordTones.every((pc) => present.has(pc));
}

/**
 * The generator's filter predicate.
 */
export function isStructurallyValid(
  voicing: Voicing,
  chordTones: readonly PitchClass[]
): boolean {
  return (
    isNonCrossing(voicing) &&
    hasBoundedUpperSpacing(voicing) &&
    coversChordTones(voicing, chordTones)
  );
}

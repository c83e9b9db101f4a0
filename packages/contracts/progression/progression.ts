/**
 * Progression Types
 *
 * Input to the realization engine. Chord tones arrive already resolved
 * from whatever notation produced them (figured bass, Roman numerals,
 * lead-sheet symbols); the engine never reinterprets figures.
 */

import type { MidiNote, PitchClass } from "../primitives/primitives";
import { toPitchClass } from "../primitives/primitives";
import type { Pitch } from "../pitch/pitch";
import { createPitch } from "../pitch/pitch";

/**
 * One chord to realize: a fixed bass plus the pitch classes every
 * voicing must contain.
 */
export interface ChordSpec {
  readonly bass: Pitch;
  readonly chordTones: readonly PitchClass[];
}

/**
 * Ordered chords. A realization answers position by position.
 */
export type Progression = readonly ChordSpec[];

/**
 * Build a chord spec from absolute values. Chord tones may be given in any
 * octave; they are reduced to unique pitch classes in first-seen order.
 *
 * @example
 * createChordSpec(48, [48, 52, 55]) // C major over C3
 */
export function createChordSpec(
  bass: MidiNote,
  chordTones: readonly number[]
): ChordSpec {
  const pcs: PitchClass[] = [];
  for (const tone of chordTones) {
    const pc = toPitchClass(tone);
    if (!pcs.includes(pc)) pcs.push(pc);
  }
  return Object.freeze({ bass: createPitch(bass), chordTones: Object.freeze(pcs) });
}

import type { MidiNote, PitchClass } from "../primitives/primitives";
import { toPitchClass } from "../primitives/primitives";

/**
 * A single absolute pitch. Immutable: values built by `createPitch` are frozen.
 *
 * Unlike a sounding note there is no duration or velocity here; this is
 * the unit the voicing engine reasons about.
 */
export interface Pitch {
  readonly midi: MidiNote;
  readonly pc: PitchClass;
}

/**
 * Build a pitch from an absolute value.
 * Voice ranges are a generation concern, so no bounds are enforced here.
 */
export function createPitch(midi: MidiNote): Pitch {
  return Object.freeze({ midi, pc: toPitchClass(midi) });
}

/** Ordering by absolute value, suitable for `Array.prototype.sort`. */
export function comparePitches(a: Pitch, b: Pitch): number {
  return a.midi - b.midi;
}

export function pitchesEqual(a: Pitch, b: Pitch): boolean {
  return a.midi === b.midi;
}

import type { MidiNote } from "../primitives/primitives";
import type { Pitch } from "../pitch/pitch";

/**
 * The four voices of a chorale texture, named top to bottom.
 */
export type VoicePart = "soprano" | "alto" | "tenor" | "bass";

export const VOICE_PARTS: readonly VoicePart[] = [
  "soprano",
  "alto",
  "tenor",
  "bass",
];

/**
 * Voices the generator is free to place. The bass is always given by
 * the chord.
 */
export const UPPER_VOICE_PARTS: readonly VoicePart[] = [
  "soprano",
  "alto",
  "tenor",
];

/**
 * One complete four-voice assignment for a single chord.
 */
export interface Voicing {
  readonly soprano: Pitch;
  readonly alto: Pitch;
  readonly tenor: Pitch;
  readonly bass: Pitch;
}

/**
 * Pitches of a voicing ordered soprano, alto, tenor, bass.
 */
export function voicingPitches(voicing: Voicing): [Pitch, Pitch, Pitch, Pitch] {
  return [voicing.soprano, voicing.alto, voicing.tenor, voicing.bass];
}

// ============================================================================
// Voice Ranges
// ============================================================================

/**
 * Inclusive absolute range for one voice.
 */
export interface VoiceRange {
  min: MidiNote;
  max: MidiNote;
}

export type VoiceRanges = Record<VoicePart, VoiceRange>;

/**
 * Conventional chorale ranges:
 *   soprano C4..G5, alto G3..C5, tenor C3..G4, bass E2..C4
 *
 * Passed explicitly wherever ranges matter; override per voice with
 * `mergeVoiceRanges`.
 */
export const DEFAULT_VOICE_RANGES: Readonly<VoiceRanges> = Object.freeze({
  soprano: { min: 60, max: 79 },
  alto: { min: 55, max: 72 },
  tenor: { min: 48, max: 67 },
  bass: { min: 40, max: 60 },
});

/**
 * Integer midpoint of a range (rounded down).
 */
export function rangeMidpoint(range: VoiceRange): MidiNote {
  return Math.floor((range.min + range.max) / 2);
}

export function isWithinRange(pitch: Pitch, range: VoiceRange): boolean {
  return pitch.midi >= range.min && pitch.midi <= range.max;
}

/**
 * Apply per-voice overrides on top of a base set of ranges.
 */
export function mergeVoiceRanges(
  base: Readonly<VoiceRanges>,
  overrides: Partial<VoiceRanges> = {}
): VoiceRanges {
  return {
    soprano: overrides.soprano ?? base.soprano,
    alto: overrides.alto ?? base.alto,
    tenor: overrides.tenor ?? base.tenor,
    bass: overrides.bass ?? base.bass,
  };
}

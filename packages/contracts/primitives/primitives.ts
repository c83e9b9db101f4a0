/**
 * Absolute pitch as a semitone number. 60 = middle C (C4), matching the
 * standard 0..127 note-number convention. Not range-checked.
 */
export type MidiNote = number;

/**
 * Octave-invariant note identity. C = 0 ... B = 11.
 */
export type PitchClass = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11;

export const PITCH_CLASSES: readonly PitchClass[] = [
  0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
];

/**
 * Reduce any integer to its pitch class. Negative values wrap upward,
 * so -1 maps to 11 (B).
 */
export function toPitchClass(value: number): PitchClass {
  return PITCH_CLASSES[((value % 12) + 12) % 12];
}

/**
 * Note-name conversion for display and for reading hand-written input.
 * Uses Tonal.js; nothing in generation or scoring depends on names.
 */

import * as Tonal from "tonal";
import type { MidiNote, Pitch, PitchClass, Voicing } from "@continuo/contracts";
import { toPitchClass } from "@continuo/contracts";

/**
 * Scientific pitch name with sharps, e.g. 60 → "C4", 61 → "C#4".
 */
export function pitchName(pitch: Pitch): string {
  return Tonal.Midi.midiToNoteName(pitch.midi, { sharps: true });
}

export function pitchClassName(pc: PitchClass): string {
  return Tonal.Midi.midiToNoteName(pc, { sharps: true, pitchClass: true });
}

/**
 * One-line rendering, e.g. "S:G4 A:E4 T:C4 B:C3".
 */
export function formatVoicing(voicing: Voicing): string {
  return [
    `S:${pitchName(voicing.soprano)}`,
    `A:${pitchName(voicing.alto)}`,
    `T:${pitchName(voicing.tenor)}`,
    `B:${pitchName(voicing.bass)}`,
  ].join(" ");
}

/**
 * Parse a note name with octave ("C3", "Bb2", "F#4") to a MIDI number.
 *
 * @throws If the name has no octave or is not a note
 */
export function parseNoteName(name: string): MidiNote {
  const midi = Tonal.Note.midi(name.trim());
  if (typeof midi !== "number") {
    throw new Error(`Not a note with octave: "${name}"`);
  }
  return midi;
}

/**
 * Parse a pitch-class name ("C", "Eb", "F#"). An octave, if present, is
 * ignored.
 *
 * @throws If the name is not a note
 */
export function parsePitchClassName(name: string): PitchClass {
  const chroma = Tonal.Note.get(name.trim()).chroma;
  if (chroma === undefined) {
    throw new Error(`Not a note name: "${name}"`);
  }
  return toPitchClass(chroma);
}

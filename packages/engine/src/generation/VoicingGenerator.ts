/**
 * Voicing Generator
 *
 * Enumerates every structurally valid four-voice voicing of one chord.
 *
 * ## Algorithm
 *
 * 1. For soprano, alto and tenor, list every absolute pitch of every chord
 *    tone inside that voice's range (sorted, deduplicated).
 * 2. Walk the product soprano × alto × tenor, soprano outermost and tenor
 *    innermost. The bass is fixed to the chord's bass.
 * 3. Keep combinations that pass `isStructurallyValid`.
 *
 * The walk order in step 2 is the canonical generation order. The
 * realizer breaks score ties by it, so it must not change.
 *
 * The search is exhaustive. Candidate lists hold a handful of pitches each
 * (range width / 12 × chord-tone count), so the product stays small.
 */

import type {
  ChordSpec,
  MidiNote,
  Pitch,
  PitchClass,
  VoiceRange,
  VoiceRanges,
  Voicing,
} from "@continuo/contracts";
import { createPitch } from "@continuo/contracts";
import { isStructurallyValid } from "./constraints";

/**
 * Every pitch of the given pitch classes inside an inclusive range,
 * ascending and without duplicates.
 */
export function candidatePitches(
  pitchClasses: readonly PitchClass[],
  range: VoiceRange
): Pitch[] {
  const midis = new Set<MidiNote>();

  for (const pc of pitchClasses) {
    let midi: MidiNote = pc;
    while (midi < range.min) {
      midi += 12;
    }
    while (midi <= range.max) {
      midis.add(midi);
      midi += 12;
    }
  }

  return [...midis].sort((a, b) => a - b).map(createPitch);
}

/**
 * Lazily yields every valid voicing in canonical generation order.
 */
export function* enumerateVoicings(
  chord: ChordSpec,
  ranges: VoiceRanges
): Generator<Voicing> {
  const sopranos = candidatePitches(chord.chordTones, ranges.soprano);
  const altos = candidatePitches(chord.chordTones, ranges.alto);
  const tenors = candidatePitches(chord.chordTones, ranges.tenor);

  for (const [soprano, alto, tenor] of upperVoiceCombinations(
    sopranos,
    altos,
    tenors
  )) {
    const voicing: Voicing = { soprano, alto, tenor, bass: chord.bass };
    if (isStructurallyValid(voicing, chord.chordTones)) {
      yield voicing;
    }
  }
}

/**
 * All valid voicings for a chord. An empty result is not an error here;
 * the realizer decides what it means.
 */
export function generateVoicings(
  chord: ChordSpec,
  ranges: VoiceRanges
): Voicing[] {
  return [...enumerateVoicings(chord, ranges)];
}

function* upperVoiceCombinations(
  sopranos: Pitch[],
  altos: Pitch[],
  tenors: Pitch[]
): Generator<[Pitch, Pitch, Pitch]> {
  for (const soprano of sopranos) {
    for (const alto of altos) {
      for (const tenor of tenors) {
        yield [soprano, alto, tenor];
      }
    }
  }
}

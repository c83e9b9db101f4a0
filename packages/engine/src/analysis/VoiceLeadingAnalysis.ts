/**
 * Voice-Leading Analysis
 *
 * Post-hoc checks on a finished realization: structural invariants per
 * voicing, parallel fifths/octaves between neighbours, and total motion.
 * Findings are reported as diagnostics, never thrown.
 */

import type {
  ChordSpec,
  Diagnostic,
  Progression,
  VoicePart,
  VoiceRanges,
  Voicing,
} from "@continuo/contracts";
import { VOICE_PARTS, isWithinRange } from "@continuo/contracts";
import {
  MAX_UPPER_VOICE_GAP,
  coversChordTones,
  isNonCrossing,
} from "../generation/constraints";
import {
  findParallelMotions,
  upperVoiceMotion,
} from "../scoring/VoicingScorer";

export interface VoicingIssue {
  type: "crossing" | "spacing" | "coverage" | "range";
  message: string;
  parts?: VoicePart[];
}

export interface RealizationAnalysis {
  diagnostics: Diagnostic[];

  /** Σ |ΔS| + |ΔA| + |ΔT| over consecutive voicings, in semitones */
  totalVoiceMotion: number;
}

const SOURCE = "voice-leading-analysis";

/**
 * Every invariant a single voicing breaks. Empty means the voicing is valid.
 * Unlike generation, this also checks the bass against its range.
 */
export function checkVoicing(
  voicing: Voicing,
  chord: ChordSpec,
  ranges: VoiceRanges
): VoicingIssue[] {
  const issues: VoicingIssue[] = [];

  if (!isNonCrossing(voicing)) {
    issues.push({ type: "crossing", message: "Voices cross" });
  }

  const gaps: [VoicePart, VoicePart][] = [
    ["soprano", "alto"],
    ["alto", "tenor"],
  ];
  for (const [upper, lower] of gaps) {
    if (voicing[upper].midi - voicing[lower].midi > MAX_UPPER_VOICE_GAP) {
      issues.push({
        type: "spacing",
        message: `More than an octave between ${upper} and ${lower}`,
        parts: [upper, lower],
      });
    }
  }

  if (!coversChordTones(voicing, chord.chordTones)) {
    issues.push({ type: "coverage", message: "Missing chord tone" });
  }

  for (const part of VOICE_PARTS) {
    const range = ranges[part];
    if (!isWithinRange(voicing[part], range)) {
      issues.push({
        type: "range",
        message: `${part} ${voicing[part].midi} outside ${range.min}..${range.max}`,
        parts: [part],
      });
    }
  }

  return issues;
}

export function totalVoiceMotion(voicings: readonly Voicing[]): number {
  let total = 0;
  for (let i = 1; i < voicings.length; i++) {
    total += upperVoiceMotion(voicings[i - 1], voicings[i]);
  }
  return total;
}

/**
 * Analyze a realization. `voicings[i]` must answer `progression[i]`.
 *
 * Chord numbers in messages are 1-based; `chordIndex` stays 0-based.
 */
export function analyzeRealization(
  progression: Progression,
  voicings: readonly Voicing[],
  ranges: VoiceRanges
): RealizationAnalysis {
  if (progression.length !== voicings.length) {
    throw new Error(
      `Expected ${progression.length} voicings, got ${voicings.length}`
    );
  }

  const diagnostics: Diagnostic[] = [];

  voicings.forEach((voicing, index) => {
    for (const issue of checkVoicing(voicing, progression[index], ranges)) {
      diagnostics.push({
        id: `${SOURCE}:${index}:${issue.type}:${issue.parts?.join("-") ?? ""}`,
        category: "voicing",
        severity: "error",
        message: `Chord ${index + 1}: ${issue.message}`,
        source: SOURCE,
        chordIndex: index,
        parts: issue.parts,
      });
    }

    if (index === 0) return;
    for (const motion of findParallelMotions(voicings[index - 1], voicing)) {
      const kind = motion.interval === 7 ? "fifths" : "octaves";
      diagnostics.push({
        id: `${SOURCE}:${index}:parallel:${motion.upper}-${motion.lower}`,
        category: "voice-leading",
        severity: "warning",
        message: `Parallel ${kind} between ${motion.upper} and ${motion.lower} (chords ${index} and ${index + 1})`,
        source: SOURCE,
        chordIndex: index,
        parts: [motion.upper, motion.lower],
      });
    }
  });

  return { diagnostics, totalVoiceMotion: totalVoiceMotion(voicings) };
}

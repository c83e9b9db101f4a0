/**
 * Golden tests for progression realization
 *
 * Each fixture lists chords as a bass MIDI number and chord-tone pitch
 * classes, and records the selected voicings with their scores and
 * candidate counts.
 */

import { describe, it } from "vitest";
import type { VoiceRanges } from "@continuo/contracts";
import {
  DEFAULT_VOICE_RANGES,
  createChordSpec,
  mergeVoiceRanges,
  voicingPitches,
} from "@continuo/contracts";
import {
  ProgressionRealizer,
  type RealizationResult,
} from "../../../src/realization/ProgressionRealizer";
import {
  assertOrUpdate,
  loadFixturesFromDir,
  type Fixture,
} from "../harness";

interface RealizationInput {
  chords: { bass: number; tones: number[] }[];
  ranges?: Partial<VoiceRanges>;
}

type RealizationSummary =
  | {
      success: true;
      steps: { voicing: number[]; score: number; candidateCount: number }[];
    }
  | { success: false; chordIndex: number };

type RealizationFixture = Fixture<RealizationInput, RealizationSummary>;

function summarize(result: RealizationResult): RealizationSummary {
  if (!result.success) {
    return { success: false, chordIndex: result.error.chordIndex };
  }
  return {
    success: true,
    steps: result.steps.map((step) => ({
      voicing: voicingPitches(step.voicing).map((p) => p.midi),
      score: step.score,
      candidateCount: step.candidateCount,
    })),
  };
}

describe("golden: progression realization", () => {
  for (const { path, fixture } of loadFixturesFromDir<RealizationFixture>(
    "realization"
  )) {
    it(fixture.description, () => {
      const progression = fixture.input.chords.map((chord) =>
        createChordSpec(chord.bass, chord.tones)
      );
      const realizer = new ProgressionRealizer({
        ranges: mergeVoiceRanges(DEFAULT_VOICE_RANGES, fixture.input.ranges),
      });

      assertOrUpdate(path, fixture, summarize(realizer.realize(progression)));
    });
  }
});

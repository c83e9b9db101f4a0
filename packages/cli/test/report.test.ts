/**
 * Tests for the text report
 */

import { describe, it, expect } from "vitest";
import { createPitch } from "@continuo/contracts";
import type { Voicing } from "@continuo/contracts";
import { renderReport } from "../src/report";

function voicing(s: number, a: number, t: number, b: number): Voicing {
  return {
    soprano: createPitch(s),
    alto: createPitch(a),
    tenor: createPitch(t),
    bass: createPitch(b),
  };
}

describe("renderReport", () => {
  it("lists each diagnostic with its severity", () => {
    const lines = renderReport([voicing(67, 60, 52, 48), voicing(69, 62, 53, 48)], {
      diagnostics: [
        {
          id: "a",
          category: "voice-leading",
          severity: "warning",
          message: "Parallel fifths between soprano and alto (chords 1 and 2)",
        },
        {
          id: "b",
          category: "voicing",
          severity: "error",
          message: "Chord 2: Missing chord tone",
        },
      ],
      totalVoiceMotion: 5,
    });

    expect(lines).toEqual([
      "Chord 1: S:G4 A:C4 T:E3 B:C3",
      "Chord 2: S:A4 A:D4 T:F3 B:C3",
      "",
      "--- Analysis ---",
      "Warning: Parallel fifths between soprano and alto (chords 1 and 2)",
      "Error: Chord 2: Missing chord tone",
      "Total voice motion: 5 semitones",
    ]);
  });
});

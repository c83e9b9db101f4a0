import type { RealizationAnalysis } from "@continuo/engine";
import { formatVoicing } from "@continuo/engine";
import type { Voicing } from "@continuo/contracts";

/** Printed before realization starts, so verbose progress follows it. */
export const REPORT_HEADER: readonly string[] = [
  "Realizing figured bass progression...",
  "",
];

/**
 * Voicings and analysis of a successful realization, one entry per output
 * line.
 */
export function renderReport(
  voicings: readonly Voicing[],
  analysis: RealizationAnalysis
): string[] {
  const lines: string[] = [];

  voicings.forEach((voicing, i) => {
    lines.push(`Chord ${i + 1}: ${formatVoicing(voicing)}`);
  });

  lines.push("", "--- Analysis ---");

  for (const diagnostic of analysis.diagnostics) {
    const label = diagnostic.severity === "error" ? "Error" : "Warning";
    lines.push(`${label}: ${diagnostic.message}`);
  }

  lines.push(`Total voice motion: ${analysis.totalVoiceMotion} semitones`);

  return lines;
}

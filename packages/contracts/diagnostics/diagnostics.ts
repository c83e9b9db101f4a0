import type { VoicePart } from "../voicing/voicing";

/**
 * Diagnostic categories for grouping.
 * - voicing: a voicing breaks one of its structural invariants
 * - voice-leading: a fault between two consecutive voicings
 */
export type DiagnosticCategory = "voicing" | "voice-leading";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A finding about a realization, reported rather than thrown.
 */
export interface Diagnostic {
  /**
   * Source, chord index, finding type and voices, e.g.
   * "voice-leading-analysis:1:parallel:soprano-alto"
   */
  id: string;

  /** Category for grouping */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Optional: which component emitted this */
  source?: string;

  /** Optional: 0-based index of the chord the finding belongs to */
  chordIndex?: number;

  /** Optional: voices involved */
  parts?: VoicePart[];
}

/**
 * A validation error returned when an input fails validation.
 */
export interface ValidationError {
  /** Which field or parameter failed */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}

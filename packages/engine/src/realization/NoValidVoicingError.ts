/**
 * Raised when a chord has no structurally valid voicing under the
 * configured ranges. Realization stops at that chord.
 */
export class NoValidVoicingError extends Error {
  /** 0-based index of the chord that could not be voiced */
  readonly chordIndex: number;

  constructor(chordIndex: number) {
    super(`No valid voicing for chord ${chordIndex}`);
    this.name = "NoValidVoicingError";
    this.chordIndex = chordIndex;
  }
}

import type { Progression } from "@continuo/contracts";
import { createChordSpec } from "@continuo/contracts";

/**
 * I – IV – V – I in C major, all in root position.
 */
export const DEMO_PROGRESSION: Progression = [
  createChordSpec(48, [48, 52, 55]), // C3: C E G
  createChordSpec(53, [53, 57, 60]), // F3: F A C
  createChordSpec(55, [55, 59, 62]), // G3: G B D
  createChordSpec(48, [48, 52, 55]), // C3: C E G
];

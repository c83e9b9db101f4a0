/**
 * Progression File
 *
 * Reads a progression from JSON. Notes may be written as names ("C3",
 * "Eb") or as numbers; chord tones in any octave are reduced to pitch
 * classes.
 *
 * ```json
 * {
 *   "chords": [
 *     { "bass": "C3", "tones": ["C", "E", "G"] },
 *     { "bass": 53, "tones": [53, 57, 60] }
 *   ],
 *   "ranges": { "soprano": { "min": 60, "max": 81 } }
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type {
  Progression,
  ValidationError,
  VoiceRanges,
} from "@continuo/contracts";
import {
  DEFAULT_VOICE_RANGES,
  createChordSpec,
  mergeVoiceRanges,
  toPitchClass,
} from "@continuo/contracts";
import { parseNoteName, parsePitchClassName } from "@continuo/engine";

export interface LoadedProgression {
  progression: Progression;
  ranges: VoiceRanges;
}

export class ProgressionFileError extends Error {
  readonly errors: ValidationError[];

  constructor(source: string, errors: ValidationError[]) {
    super(
      `Invalid progression file ${source}:\n` +
        errors
          .map((e) => `  ${e.field}: ${e.reason}${e.hint ? ` (${e.hint})` : ""}`)
          .join("\n")
    );
    this.name = "ProgressionFileError";
    this.errors = errors;
  }
}

// ============================================================================
// Schema
// ============================================================================

const bassSchema = z
  .union([z.number().int(), z.string().min(1)])
  .transform((value, ctx) => {
    if (typeof value === "number") return value;
    try {
      return parseNoteName(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const toneSchema = z
  .union([z.number().int(), z.string().min(1)])
  .transform((value, ctx) => {
    if (typeof value === "number") return toPitchClass(value);
    try {
      return parsePitchClassName(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const rangeSchema = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
  })
  .refine((range) => range.min <= range.max, {
    message: "min must not exceed max",
  });

export const progressionFileSchema = z.object({
  chords: z.array(
    z.object({
      bass: bassSchema,
      tones: z.array(toneSchema).min(1),
    })
  ),
  ranges: z
    .object({
      soprano: rangeSchema.optional(),
      alto: rangeSchema.optional(),
      tenor: rangeSchema.optional(),
      bass: rangeSchema.optional(),
    })
    .strict()
    .optional(),
});

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate already-parsed JSON.
 *
 * @param source - Shown in error messages (usually the file path)
 * @throws ProgressionFileError listing every problem found
 */
export function parseProgressionFile(
  data: unknown,
  source: string = "<input>"
): LoadedProgression {
  const parsed = progressionFileSchema.safeParse(data);

  if (!parsed.success) {
    throw new ProgressionFileError(
      source,
      parsed.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        reason: issue.message,
      }))
    );
  }

  return {
    progression: parsed.data.chords.map((chord) =>
      createChordSpec(chord.bass, chord.tones)
    ),
    ranges: mergeVoiceRanges(DEFAULT_VOICE_RANGES, parsed.data.ranges),
  };
}

export async function loadProgressionFile(
  path: string
): Promise<LoadedProgression> {
  const content = await readFile(path, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    throw new ProgressionFileError(path, [
      {
        field: "(file)",
        reason: e instanceof Error ? e.message : String(e),
        hint: "expected a JSON object with a \"chords\" array",
      },
    ]);
  }

  return parseProgressionFile(data, path);
}

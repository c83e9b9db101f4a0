/**
 * Command-line front end.
 *
 *   continuo [file.json] [--verbose]
 *
 * Without a file the built-in I–IV–V–I demo is realized.
 *
 * Exit codes: 0 success, 1 a chord could not be voiced, 2 bad usage or
 * unreadable input.
 */

import { parseArgs } from "node:util";
import type { Progression, VoiceRanges } from "@continuo/contracts";
import { DEFAULT_VOICE_RANGES } from "@continuo/contracts";
import { ProgressionRealizer, analyzeRealization } from "@continuo/engine";
import { DEMO_PROGRESSION } from "./demo";
import { ProgressionFileError, loadProgressionFile } from "./progressionFile";
import { REPORT_HEADER, renderReport } from "./report";

export type CliOutput = Pick<Console, "log" | "error">;

export const EXIT_OK = 0;
export const EXIT_NO_VOICING = 1;
export const EXIT_USAGE = 2;

const USAGE = "Usage: continuo [progression.json] [--verbose]";

export async function runCli(
  args: string[],
  out: CliOutput = console
): Promise<number> {
  let file: string | undefined;
  let verbose = false;

  try {
    const parsed = parseArgs({
      args,
      options: {
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: true,
    });
    if (parsed.values.help) {
      out.log(USAGE);
      return EXIT_OK;
    }
    if (parsed.positionals.length > 1) {
      out.error(USAGE);
      return EXIT_USAGE;
    }
    file = parsed.positionals[0];
    verbose = parsed.values.verbose ?? false;
  } catch (err) {
    out.error(err instanceof Error ? err.message : String(err));
    out.error(USAGE);
    return EXIT_USAGE;
  }

  let progression: Progression = DEMO_PROGRESSION;
  let ranges: VoiceRanges = DEFAULT_VOICE_RANGES;

  if (file !== undefined) {
    try {
      ({ progression, ranges } = await loadProgressionFile(file));
    } catch (err) {
      if (err instanceof ProgressionFileError) {
        out.error(err.message);
        return EXIT_USAGE;
      }
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        out.error(`File not found: ${file}`);
        return EXIT_USAGE;
      }
      throw err;
    }
  }

  for (const line of REPORT_HEADER) {
    out.log(line);
  }

  const realizer = new ProgressionRealizer({ ranges, verbose });
  const result = realizer.realize(progression);

  if (!result.success) {
    out.error(`Error: ${result.error.message}`);
    return EXIT_NO_VOICING;
  }

  const analysis = analyzeRealization(progression, result.voicings, ranges);
  for (const line of renderReport(result.voicings, analysis)) {
    out.log(line);
  }

  return EXIT_OK;
}

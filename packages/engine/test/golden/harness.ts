/**
 * Golden Test Harness
 *
 * Loads realization fixtures, compares engine output against them with a
 * float tolerance, and rewrites them on request.
 *
 * Usage:
 *   for (const { path, fixture } of loadFixturesFromDir<RealizationFixture>("realization")) {
 *     assertOrUpdate(path, fixture, summarize(realizer.realize(...)));
 *   }
 *
 * To update fixtures when behavior intentionally changes:
 *   UPDATE_GOLDEN=1 npm test
 */

import { readFileSync, writeFileSync, existsSync, readdirSync } from "fs";
import { resolve } from "path";
import { fileURLToPath } from "url";
import { expect } from "vitest";

// ============================================================================
// Types
// ============================================================================

/**
 * Input/expected pair for one golden case.
 */
export interface Fixture<TInput, TOutput> {
  description: string;
  input: TInput;
  expected: TOutput;
}

export interface LoadedFixture<T> {
  /** Path relative to fixtures/ */
  path: string;
  fixture: T;
}

export interface CompareOptions {
  /** Tolerance for floating point comparisons (default: 1e-9) */
  floatTolerance?: number;
}

// ============================================================================
// Fixture Loading
// ============================================================================

const FIXTURES_DIR = fileURLToPath(new URL("fixtures", import.meta.url));

/**
 * Load a JSON fixture file.
 *
 * @param relativePath - Path relative to fixtures/
 * @throws If the file doesn't exist or isn't valid JSON
 */
export function loadFixture<T>(relativePath: string): T {
  const fullPath = resolve(FIXTURES_DIR, relativePath);

  if (!existsSync(fullPath)) {
    throw new Error(`Fixture not found: ${relativePath}\n  at: ${fullPath}`);
  }

  const content = readFileSync(fullPath, "utf-8");

  try {
    return JSON.parse(content) as T;
  } catch (e) {
    throw new Error(
      `Invalid JSON in fixture: ${relativePath}\n  ${e instanceof Error ? e.message : e}`
    );
  }
}

/**
 * Load every fixture in a directory, sorted by file name.
 */
export function loadFixturesFromDir<T>(dir: string): LoadedFixture<T>[] {
  const fullPath = resolve(FIXTURES_DIR, dir);

  if (!existsSync(fullPath)) {
    return [];
  }

  return readdirSync(fullPath)
    .filter((f) => f.endsWith(".json"))
    .sort()
    .map((f) => {
      const path = `${dir}/${f}`;
      return { path, fixture: loadFixture<T>(path) };
    });
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Deep equality with float tolerance.
 *
 * @returns null if equal, or a description of the first difference
 */
export function compareDeep(
  actual: unknown,
  expected: unknown,
  options: CompareOptions = {},
  path: string = ""
): string | null {
  const { floatTolerance = 1e-9 } = options;
  const where = path || "root";

  if (actual === null && expected === null) return null;
  if (actual === null || actual === undefined) {
    return `${where}: expected ${JSON.stringify(expected)}, got ${actual}`;
  }
  if (expected === null || expected === undefined) {
    return `${where}: expected ${expected}, got ${JSON.stringify(actual)}`;
  }

  if (typeof actual !== typeof expected) {
    return `${where}: type mismatch - expected ${typeof expected}, got ${typeof actual}`;
  }

  if (typeof actual === "number" && typeof expected === "number") {
    if (Math.abs(actual - expected) > floatTolerance) {
      return `${where}: ${actual} !== ${expected} (diff: ${Math.abs(actual - expected)})`;
    }
    return null;
  }

  if (typeof actual === "string" || typeof actual === "boolean") {
    if (actual !== expected) {
      return `${where}: ${JSON.stringify(actual)} !== ${JSON.stringify(expected)}`;
    }
    return null;
  }

  if (Array.isArray(actual)) {
    if (!Array.isArray(expected)) {
      return `${where}: expected ${typeof expected}, got array`;
    }
    if (actual.length !== expected.length) {
      return `${where}: array length ${actual.length} !== ${expected.length}`;
    }
    for (let i = 0; i < actual.length; i++) {
      const diff = compareDeep(actual[i], expected[i], options, `${path}[${i}]`);
      if (diff) return diff;
    }
    return null;
  }

  if (isRecord(actual) && isRecord(expected)) {
    const actualKeys = Object.keys(actual);
    const expectedKeys = Object.keys(expected);

    const missingKeys = expectedKeys.filter((k) => !actualKeys.includes(k));
    if (missingKeys.length > 0) {
      return `${where}: missing keys: ${missingKeys.join(", ")}`;
    }
    const extraKeys = actualKeys.filter((k) => !expectedKeys.includes(k));
    if (extraKeys.length > 0) {
      return `${where}: extra keys: ${extraKeys.join(", ")}`;
    }

    for (const key of actualKeys) {
      const diff = compareDeep(
        actual[key],
        expected[key],
        options,
        path ? `${path}.${key}` : key
      );
      if (diff) return diff;
    }
    return null;
  }

  return `${where}: unexpected type ${typeof actual}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Assert that actual matches expected, printing both on failure.
 */
export function expectMatches<T>(
  actual: T,
  expected: T,
  options: CompareOptions = {}
): void {
  const diff = compareDeep(actual, expected, options);

  if (diff) {
    expect.fail(
      `Golden mismatch:\n  ${diff}\n\nActual:\n${JSON.stringify(actual, null, 2)}\n\nExpected:\n${JSON.stringify(expected, null, 2)}`
    );
  }
}

// ============================================================================
// Fixture Updates
// ============================================================================

export function shouldUpdateGolden(): boolean {
  return process.env.UPDATE_GOLDEN === "1";
}

/**
 * Overwrite a fixture file. Only allowed when UPDATE_GOLDEN=1 is set.
 */
export function updateFixture<T>(relativePath: string, fixture: T): void {
  if (!shouldUpdateGolden()) {
    throw new Error(
      "Cannot update fixture without UPDATE_GOLDEN=1 environment variable"
    );
  }

  const fullPath = resolve(FIXTURES_DIR, relativePath);
  writeFileSync(fullPath, JSON.stringify(fixture, null, 2) + "\n", "utf-8");
  console.log(`Updated fixture: ${relativePath}`);
}

/**
 * Compare against the fixture, or rewrite its `expected` when
 * UPDATE_GOLDEN=1 is set.
 */
export function assertOrUpdate<TInput, TOutput>(
  relativePath: string,
  fixture: Fixture<TInput, TOutput>,
  actual: TOutput,
  options: CompareOptions = {}
): void {
  if (shouldUpdateGolden()) {
    updateFixture(relativePath, { ...fixture, expected: actual });
  } else {
    expectMatches(actual, fixture.expected, options);
  }
}

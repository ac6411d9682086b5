/**
 * OUTCOME: typed absence instead of a bare null
 *
 * Every core operation that may legitimately produce nothing says why:
 *
 * - MISSING_ARTIFACT    source path does not exist
 * - MALFORMED_ARTIFACT  file exists but is not tabular data
 * - SCHEMA_MISMATCH     a required concept/column could not be resolved
 * - NO_SOURCE           no input dataset was supplied at all
 * - EMPTY_RESULT        inputs were usable but nothing survived parsing
 * - INSUFFICIENT_DATA   fallback forecast has no numeric history
 *
 * Only INSUFFICIENT_DATA is a reported failure; the rest degrade silently
 * (but are logged).
 */

export type Absence =
  | { kind: 'MISSING_ARTIFACT'; path: string }
  | { kind: 'MALFORMED_ARTIFACT'; path: string; detail: string }
  | { kind: 'SCHEMA_MISMATCH'; missing: string[]; available: string[] }
  | { kind: 'NO_SOURCE'; detail: string }
  | { kind: 'EMPTY_RESULT'; detail: string }
  | { kind: 'INSUFFICIENT_DATA'; detail: string };

export type Outcome<T, A extends Absence = Absence> =
  | { ok: true; value: T }
  | { ok: false; absence: A };

export function present<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function absent<A extends Absence>(absence: A): { ok: false; absence: A } {
  return { ok: false, absence };
}

export function describeAbsence(absence: Absence): string {
  switch (absence.kind) {
    case 'MISSING_ARTIFACT':
      return `Artifact not found: ${absence.path}`;
    case 'MALFORMED_ARTIFACT':
      return `Artifact could not be parsed (${absence.path}): ${absence.detail}`;
    case 'SCHEMA_MISMATCH':
      return `Required columns not found: ${absence.missing.join(', ')}`;
    case 'NO_SOURCE':
    case 'EMPTY_RESULT':
    case 'INSUFFICIENT_DATA':
      return absence.detail;
  }
}

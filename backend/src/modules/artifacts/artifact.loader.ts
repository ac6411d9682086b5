/**
 * ARTIFACT LOADER
 * ===============
 *
 * Tolerant load of an optional CSV artifact.
 * Never throws: a missing file or unparsable content comes back as a typed
 * absence, logged so operators can tell the two apart.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { absent, present, type Absence, type Outcome } from '../../common/outcome.js';
import { toError } from '../../common/errors.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import { coerceCell, createDataset, type CellValue, type TabularDataset } from './dataset.js';

export type LoadAbsence = Extract<Absence, { kind: 'MISSING_ARTIFACT' | 'MALFORMED_ARTIFACT' }>;

export type LoadOutcome = Outcome<TabularDataset, LoadAbsence>;

export class MalformedContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedContentError';
  }
}

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((f) => typeof f === 'string'))
  );
}

/**
 * Header names as a dataframe reader would expose them:
 * blank → "Unnamed: <index>", repeated → "name.1", "name.2", ...
 */
export function normalizeHeader(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((raw, index) => {
    const base = raw.trim() === '' ? `Unnamed: ${index}` : raw;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

/**
 * Parse CSV text into a dataset.
 * @throws MalformedContentError when the text is not tabular
 */
export function parseTabular(text: string): TabularDataset {
  if (text.includes('\u0000')) {
    throw new MalformedContentError('binary content');
  }

  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count_less: true,
    });
  } catch (err) {
    throw new MalformedContentError(toError(err).message);
  }

  if (!isStringMatrix(records) || records.length === 0) {
    throw new MalformedContentError('no header row');
  }

  const [header, ...body] = records;
  const columns = normalizeHeader(header);

  const rows = body.map((fields) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((col, i) => {
      const raw = fields[i];
      row[col] = raw === undefined ? null : coerceCell(raw);
    });
    return row;
  });

  return createDataset(columns, rows);
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

// stat errors meaning "nothing is there"; any other failure is malformed
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);

export type PathStat =
  | { state: 'present'; stat: fs.Stats }
  | { state: 'missing' }
  | { state: 'failed'; detail: string };

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** fs.statSync that never throws. */
export function statPath(filePath: string): PathStat {
  try {
    const stat = fs.statSync(filePath, { throwIfNoEntry: false });
    return stat ? { state: 'present', stat } : { state: 'missing' };
  } catch (err) {
    const code = errorCode(err);
    if (code !== undefined && MISSING_CODES.has(code)) {
      return { state: 'missing' };
    }
    return { state: 'failed', detail: `stat failed: ${code ?? toError(err).message}` };
  }
}

export function loadArtifact(filePath: string, logger: Logger = getRootLogger()): LoadOutcome {
  const malformed = (detail: string): LoadOutcome => {
    logger.warn({ path: filePath, detail }, '[ArtifactLoader] malformed artifact');
    return absent({ kind: 'MALFORMED_ARTIFACT', path: filePath, detail });
  };

  const found = statPath(filePath);
  if (found.state === 'missing') {
    logger.debug?.({ path: filePath }, '[ArtifactLoader] artifact missing');
    return absent({ kind: 'MISSING_ARTIFACT', path: filePath });
  }
  if (found.state === 'failed') {
    return malformed(found.detail);
  }

  if (!found.stat.isFile()) {
    return malformed('not a regular file');
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    return malformed(`read failed: ${toError(err).message}`);
  }

  try {
    const dataset = parseTabular(text);
    logger.debug?.(
      { path: filePath, columns: dataset.columns.length, rows: dataset.rows.length },
      '[ArtifactLoader] artifact loaded'
    );
    return present(dataset);
  } catch (err) {
    return malformed(toError(err).message);
  }
}

/** Option form: the dataset, or null for any absence. */
export function load(filePath: string, logger?: Logger): TabularDataset | null {
  const outcome = loadArtifact(filePath, logger);
  return outcome.ok ? outcome.value : null;
}

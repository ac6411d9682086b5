/**
 * Artifact Cache Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ArtifactCache } from '../artifact.cache.js';
import { loadArtifact } from '../artifact.loader.js';

function createMockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe('ArtifactCache', () => {
  let dir: string;
  let file: string;
  let loader: Mock<typeof loadArtifact>;
  let cache: ArtifactCache;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'artifact-cache-'));
    file = path.join(dir, 'sales.csv');
    fs.writeFileSync(file, 'ds,y\n2024-01-01,10\n');
    fs.utimesSync(file, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'));

    loader = vi.fn(loadArtifact);
    cache = new ArtifactCache({ loader, logger: createMockLogger() });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads once while the mtime is unchanged', () => {
    const first = cache.getOrLoad(file);
    const second = cache.getOrLoad(file);

    expect(first.ok).toBe(true);
    expect(second).toBe(first);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1, generation: 0 });
  });

  it('reloads when the file mtime changes', () => {
    cache.getOrLoad(file);

    fs.writeFileSync(file, 'ds,y\n2024-01-01,99\n');
    fs.utimesSync(file, new Date('2024-02-01T00:00:00Z'), new Date('2024-02-01T00:00:00Z'));
    const outcome = cache.getOrLoad(file);

    expect(loader).toHaveBeenCalledTimes(2);
    expect(outcome.ok && outcome.value.rows[0]).toEqual({ ds: '2024-01-01', y: 99 });
    expect(cache.stats().entries).toBe(1);
  });

  it('never caches a missing path', () => {
    const missing = path.join(dir, 'missing.csv');

    const outcome = cache.getOrLoad(missing);

    expect(outcome).toEqual({ ok: false, absence: { kind: 'MISSING_ARTIFACT', path: missing } });
    expect(loader).not.toHaveBeenCalled();
    expect(cache.stats().entries).toBe(0);
  });

  it('neither throws nor caches on a symlink loop', () => {
    const a = path.join(dir, 'a.csv');
    const b = path.join(dir, 'b.csv');
    fs.symlinkSync(b, a);
    fs.symlinkSync(a, b);

    const first = cache.getOrLoad(a);
    const second = cache.getOrLoad(a);

    expect(first).toEqual({
      ok: false,
      absence: { kind: 'MALFORMED_ARTIFACT', path: a, detail: 'stat failed: ELOOP' },
    });
    expect(second).toEqual(first);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(cache.stats().entries).toBe(0);
  });

  it('treats an over-long file name as missing', () => {
    const long = path.join(dir, `${'a'.repeat(300)}.csv`);

    expect(cache.getOrLoad(long)).toEqual({ ok: false, absence: { kind: 'MISSING_ARTIFACT', path: long } });
    expect(loader).not.toHaveBeenCalled();
    expect(cache.stats().entries).toBe(0);
  });

  it('caches malformed outcomes too', () => {
    const bad = path.join(dir, 'bad.csv');
    fs.writeFileSync(bad, 'a,b\n1,2,3\n');

    cache.getOrLoad(bad);
    const again = cache.getOrLoad(bad);

    expect(again.ok).toBe(false);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('invalidateAll drops every entry and bumps the generation', () => {
    const other = path.join(dir, 'other.csv');
    fs.writeFileSync(other, 'a\n1\n');
    cache.getOrLoad(file);
    cache.getOrLoad(other);

    const generation = cache.invalidateAll();

    expect(generation).toBe(1);
    expect(cache.stats().entries).toBe(0);
    expect(cache.stats().generation).toBe(1);

    cache.getOrLoad(file);
    expect(loader).toHaveBeenCalledTimes(3);
  });
});

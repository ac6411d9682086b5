/**
 * ARTIFACT CACHE
 * ==============
 *
 * Process-wide memo of artifact loads keyed by (path, mtime).
 *
 * - getOrLoad() may populate entries; a changed mtime replaces the entry
 * - missing or unstat-able paths are never cached (there is no mtime to key on)
 * - invalidateAll() is the only mutation: one map swap, no per-key eviction
 *
 * Synchronous throughout; invalidateAll() is atomic on the event loop.
 */

import path from 'path';
import { absent } from '../../common/outcome.js';
import { getRootLogger, type Logger } from '../../common/logger.js';
import { loadArtifact, statPath, type LoadOutcome } from './artifact.loader.js';

export type ArtifactLoaderFn = (filePath: string, logger: Logger) => LoadOutcome;

interface CacheEntry {
  mtimeMs: number;
  outcome: LoadOutcome;
}

export interface ArtifactCacheStats {
  entries: number;
  hits: number;
  misses: number;
  generation: number;
}

export interface ArtifactCacheOptions {
  loader?: ArtifactLoaderFn;
  logger?: Logger;
}

export class ArtifactCache {
  private entries = new Map<string, CacheEntry>();
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private readonly loader: ArtifactLoaderFn;
  private readonly logger: Logger;

  constructor(options: ArtifactCacheOptions = {}) {
    this.loader = options.loader ?? loadArtifact;
    this.logger = options.logger ?? getRootLogger();
  }

  getOrLoad(filePath: string): LoadOutcome {
    const key = path.resolve(filePath);
    const found = statPath(key);

    if (found.state === 'missing') {
      this.logger.debug?.({ path: key }, '[ArtifactCache] artifact missing');
      return absent({ kind: 'MISSING_ARTIFACT', path: key });
    }
    if (found.state === 'failed') {
      // The loader reports it; nothing to key an entry on
      return this.loader(key, this.logger);
    }

    const { stat } = found;
    const cached = this.entries.get(key);
    if (cached && cached.mtimeMs === stat.mtimeMs) {
      this.hits++;
      return cached.outcome;
    }

    this.misses++;
    const outcome = this.loader(key, this.logger);
    this.entries.set(key, { mtimeMs: stat.mtimeMs, outcome });
    return outcome;
  }

  invalidateAll(): number {
    const dropped = this.entries.size;
    this.entries = new Map();
    this.generation++;
    this.logger.info(
      { dropped, generation: this.generation },
      '[ArtifactCache] cache invalidated'
    );
    return this.generation;
  }

  stats(): ArtifactCacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      generation: this.generation,
    };
  }
}

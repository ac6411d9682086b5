/**
 * ARTIFACT CATALOG
 *
 * The fixed set of artifacts the dashboard knows about and where they live.
 */

import path from 'path';
import { statPath } from './artifact.loader.js';

export type ArtifactKey =
  | 'customerSegments'
  | 'segmentProfile'
  | 'rawOrders'
  | 'categoryAggregate'
  | 'regionAggregate'
  | 'monthlyAggregate'
  | 'externalForecast';

type ArtifactRoot = 'outputs' | 'data';

export const ARTIFACT_KEYS: readonly ArtifactKey[] = [
  'customerSegments',
  'segmentProfile',
  'rawOrders',
  'categoryAggregate',
  'regionAggregate',
  'monthlyAggregate',
  'externalForecast',
];

const ARTIFACT_FILES: Readonly<Record<ArtifactKey, { root: ArtifactRoot; file: string; label: string }>> = {
  customerSegments: { root: 'outputs', file: 'customer_segments.csv', label: 'Customer segments' },
  segmentProfile: { root: 'outputs', file: 'segment_profile.csv', label: 'Segment profiles' },
  rawOrders: { root: 'data', file: 'train.csv', label: 'Raw orders' },
  categoryAggregate: { root: 'outputs', file: 'sales_by_category.csv', label: 'Sales by category' },
  regionAggregate: { root: 'outputs', file: 'sales_by_region.csv', label: 'Sales by region' },
  monthlyAggregate: { root: 'outputs', file: 'sales_by_month.csv', label: 'Sales by month' },
  externalForecast: { root: 'outputs', file: 'forecast_prophet.csv', label: 'External forecast' },
};

export interface ArtifactDescriptor {
  key: ArtifactKey;
  label: string;
  path: string;
}

export type ArtifactCatalog = Readonly<Record<ArtifactKey, ArtifactDescriptor>>;

export interface ArtifactStatus extends ArtifactDescriptor {
  exists: boolean;
  modifiedAt: string | null;   // ISO timestamp
  sizeBytes: number | null;
}

export function buildArtifactCatalog(dirs: { outputsDir: string; dataDir: string }): ArtifactCatalog {
  const at = (key: ArtifactKey): ArtifactDescriptor => {
    const { root, file, label } = ARTIFACT_FILES[key];
    const dir = root === 'outputs' ? dirs.outputsDir : dirs.dataDir;
    return { key, label, path: path.join(dir, file) };
  };

  return Object.freeze({
    customerSegments: at('customerSegments'),
    segmentProfile: at('segmentProfile'),
    rawOrders: at('rawOrders'),
    categoryAggregate: at('categoryAggregate'),
    regionAggregate: at('regionAggregate'),
    monthlyAggregate: at('monthlyAggregate'),
    externalForecast: at('externalForecast'),
  });
}

export function describeArtifact(descriptor: ArtifactDescriptor): ArtifactStatus {
  const found = statPath(descriptor.path);
  if (found.state !== 'present' || !found.stat.isFile()) {
    return { ...descriptor, exists: false, modifiedAt: null, sizeBytes: null };
  }
  const { stat } = found;
  return {
    ...descriptor,
    exists: true,
    modifiedAt: stat.mtime.toISOString(),
    sizeBytes: stat.size,
  };
}

export function describeArtifacts(catalog: ArtifactCatalog): ArtifactStatus[] {
  return ARTIFACT_KEYS.map((key) => describeArtifact(catalog[key]));
}

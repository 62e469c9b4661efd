/**
 * services/dataset-cache.ts — Explicit region → Dataset cache
 *
 * Each region is parsed once and served from memory until invalidated.
 * Datasets are frozen, so every caller shares the same read-only copy.
 *
 * Used by: dashboard, filters and region endpoints.
 */
import { existsSync } from 'fs';
import { cacheOperations, datasetLoadDuration, datasetRecords } from '../shared/metrics.ts';
import { childLogger } from '../shared/logger.ts';
import { loadDataset, datasetPath, defaultLoaderOptions, type LoaderOptions } from './loader.ts';
import { REGIONS, type Dataset, type Region, type RegionInfo } from '../types.ts';

const log = childLogger({ module: 'dataset-cache' });

export type DatasetLoaderFn = (region: Region, opts: LoaderOptions) => Dataset;

export class DatasetCache {
  private readonly entries = new Map<Region, Dataset>();

  constructor(
    private readonly opts: LoaderOptions = defaultLoaderOptions(),
    private readonly load: DatasetLoaderFn = loadDataset,
  ) {}

  /**
   * Return the region's dataset, loading it on first access.
   * Load failures are not cached; the next call retries the file.
   */
  get(region: Region): Dataset {
    const hit = this.entries.get(region);
    if (hit) {
      cacheOperations.inc({ operation: 'hit' });
      return hit;
    }

    cacheOperations.inc({ operation: 'miss' });
    const end = datasetLoadDuration.startTimer({ region });
    try {
      const dataset = this.load(region, this.opts);
      end({ status: 'ok' });
      this.entries.set(region, dataset);
      datasetRecords.set({ region }, dataset.records.length);
      return dataset;
    } catch (err) {
      end({ status: 'error' });
      throw err;
    }
  }

  has(region: Region): boolean {
    return this.entries.has(region);
  }

  /**
   * Drop one region (or all of them). Returns the number of entries removed.
   */
  invalidate(region?: Region): number {
    const targets = region ? [region] : [...this.entries.keys()];
    let count = 0;
    for (const r of targets) {
      if (this.entries.delete(r)) {
        datasetRecords.remove({ region: r });
        count++;
      }
    }
    cacheOperations.inc({ operation: 'invalidate' }, count);
    log.info({ region: region ?? 'all', count }, 'Dataset cache invalidated');
    return count;
  }

  /** Regions with their backing-file availability and cache state. */
  regions(): RegionInfo[] {
    return REGIONS.map(region => ({
      region,
      available: existsSync(datasetPath(region, this.opts)),
      cached: this.entries.has(region),
    }));
  }

  stats(): { regions: Region[]; records: number } {
    let records = 0;
    for (const d of this.entries.values()) records += d.records.length;
    return { regions: [...this.entries.keys()], records };
  }
}

// ── Singleton ──
let _cache: DatasetCache | null = null;
export function getDatasetCache(): DatasetCache {
  if (!_cache) _cache = new DatasetCache();
  return _cache;
}

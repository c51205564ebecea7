import type { Sample } from '../models/sample';
import type { ImageStore } from './image-store';
import { TaskPool } from './task-pool';

export interface LoadImagesOptions {
  maxThreads: number;
  onProgress?: (done: number, pending: number) => void;
  debug?: boolean;
}

export interface LoadImagesSummary {
  total: number;
  alreadyLoaded: number;
  loaded: number;
  failed: number;
}

/**
 * Download every sample image that is not cached yet, `maxThreads` at a time.
 * Failed downloads are counted; rerunning picks them up again.
 */
export async function loadSampleImages(
  samples: Sample[],
  store: ImageStore,
  options: LoadImagesOptions,
): Promise<LoadImagesSummary> {
  const pending = samples.filter((s) => !store.isLocallyLoaded(s));
  const pool = new TaskPool({ maxConcurrency: options.maxThreads, debug: options.debug });

  let done = 0;
  const results = await Promise.all(
    pending.map((sample) =>
      pool.run(async () => {
        const ok = await store.load(sample);
        options.onProgress?.(++done, pending.length);
        return ok;
      }),
    ),
  );

  const loaded = results.filter(Boolean).length;
  return {
    total: samples.length,
    alreadyLoaded: samples.length - pending.length,
    loaded,
    failed: pending.length - loaded,
  };
}

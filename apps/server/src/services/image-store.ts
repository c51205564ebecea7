import fs from 'node:fs';
import path from 'node:path';
import { FetchFailureError, errorMessage } from '../errors';
import type { Sample } from '../models/sample';
import { downloadToFile } from '../utils/download';

/**
 * Local image cache: <storage>/sample_images/set_<index>/<key>.jpg
 *
 * Residency is read from the filesystem on every call. There is no locking;
 * never run two loads for the same sample at once.
 */
export class ImageStore {
  constructor(private readonly storageDirectory: string) {}

  getSetPath(setIndex: number): string {
    return path.join(this.storageDirectory, 'sample_images', `set_${setIndex}`);
  }

  getImagePath(sample: Sample): string {
    if (sample.setIndex === null) {
      throw new Error(`Sample ${sample.key} has no set index; load it from a sample set file first.`);
    }
    return path.join(this.getSetPath(sample.setIndex), `${sample.key}.jpg`);
  }

  isLocallyLoaded(sample: Sample): boolean {
    return fs.existsSync(this.getImagePath(sample));
  }

  /**
   * Fetch the sample's image unless it is already cached.
   * Resolves false when the download fails; the failure is logged, not thrown.
   */
  async load(sample: Sample): Promise<boolean> {
    const imagePath = this.getImagePath(sample);
    if (fs.existsSync(imagePath)) return true;

    console.log(`[IMAGES] Loading ${sample.key}`);
    try {
      await downloadToFile(sample.remotePath, imagePath);
    } catch (error) {
      const failure = new FetchFailureError(sample.remotePath, errorMessage(error), { cause: error });
      console.error(`[IMAGES] ${failure.message}`);
      return false;
    }
    console.log(`[IMAGES] Loaded ${sample.key}`);
    return true;
  }
}

import { DetectRegion } from './detect-region';
import { parseRecord, sampleSchema } from './records';
import type { SampleData } from '../types/sample';

/**
 * A dataset image: its id, where to fetch it, and its ground-truth boxes.
 * `setIndex` is stamped when the sample is read back from a sample set file.
 */
export class Sample {
  setIndex: number | null = null;
  detectRegions: DetectRegion[] = [];

  constructor(
    public key = '',
    public remotePath = '',
  ) {}

  encode(): SampleData {
    return {
      key: this.key,
      remote_path: this.remotePath,
      detect_regions: this.detectRegions.map((r) => r.encode()),
    };
  }

  static decode(data: unknown): Sample {
    const record = parseRecord(sampleSchema, data, 'sample');
    const sample = new Sample(record.key, record.remote_path);
    sample.detectRegions = record.detect_regions.map((r) => DetectRegion.fromRecord(r));
    return sample;
  }
}

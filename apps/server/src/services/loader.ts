import fs from 'node:fs';
import path from 'node:path';
import { DetectRegion } from '../models/detect-region';
import { Sample } from '../models/sample';
import { parseRecord, sampleSetSchema } from '../models/records';
import { FileNotFoundError, MalformedRecordError, errorMessage } from '../errors';
import type { Settings } from '../config';
import type { SampleSetData } from '../types/sample';
import { downloadToFile } from '../utils/download';
import { executeOnCsv, type CsvOptions } from './csv';

export type LoaderSettings = Pick<Settings, 'samplesDirectory' | 'maxSampleSetSize'>;

export interface AssociationResult {
  /** Rows turned into a DetectRegion */
  associated: number;
  /** Rows whose image is not in the index */
  skipped: number;
}

export interface SampleSetFile {
  setIndex: number;
  file: string;
}

const SAMPLE_SET_FILE = /^sample_set_(\d+)\.json$/;

export const sampleSetFileName = (setIndex: number) => `sample_set_${setIndex}.json`;

// Ground truth columns: ImageID, Source, LabelName, Confidence, XMin, XMax, YMin, YMax,
// IsOccluded, IsTruncated, IsGroupOf, IsDepiction, IsInside
const GROUND_TRUTH_COLUMNS = 13;

/**
 * Turns the source CSVs into samples, writes them out as fixed-size sample
 * set files and reads those files back.
 */
export class Loader {
  labelMap = new Map<string, string>();

  constructor(private readonly settings: LoaderSettings) {}

  // -------- Labels --------

  async loadLabels(filePath: string, options: CsvOptions = {}): Promise<Map<string, string>> {
    const labelMap = new Map<string, string>();
    await executeOnCsv(filePath, (row, line) => {
      if (row.length < 2) {
        throw new MalformedRecordError(`Malformed label row at ${path.basename(filePath)}:${line}: expected 2 columns, got ${row.length}`);
      }
      labelMap.set(row[0], row[1]);
    }, options);

    this.labelMap = labelMap;
    return labelMap;
  }

  /** Human-readable label for a class id, or the id itself when unknown. */
  getLabel(classId: string, upper = true): string {
    const label = this.labelMap.get(classId);
    if (label === undefined) return classId;
    return upper ? label.toUpperCase() : label;
  }

  // -------- Sample creation --------

  /** Build one sample per image index row, keyed by the file name without its extension. */
  async createSamples(imageIndexPath: string, options: CsvOptions = {}): Promise<Map<string, Sample>> {
    const samples = new Map<string, Sample>();

    await executeOnCsv(imageIndexPath, (row, line) => {
      if (row.length < 2) {
        throw new MalformedRecordError(`Malformed image index row at ${path.basename(imageIndexPath)}:${line}: expected 2 columns, got ${row.length}`);
      }
      const sample = new Sample(row[0].split('.')[0], row[1]);
      // Duplicate keys: last row wins
      samples.set(sample.key, sample);
    }, options);

    console.log(`[LOADER] Samples created: ${samples.size}`);
    return samples;
  }

  /** Attach every ground-truth box to its sample. Boxes for unknown images are dropped. */
  async associateBoxesWithSamples(
    samples: Map<string, Sample>,
    groundTruthPath: string,
    options: CsvOptions = {},
  ): Promise<AssociationResult> {
    const result: AssociationResult = { associated: 0, skipped: 0 };
    const fileName = path.basename(groundTruthPath);

    await executeOnCsv(groundTruthPath, (row, line) => {
      const sample = samples.get(row[0]);
      if (!sample) {
        result.skipped++;
        return;
      }

      if (row.length < GROUND_TRUTH_COLUMNS) {
        throw new MalformedRecordError(`Malformed ground truth row at ${fileName}:${line}: expected ${GROUND_TRUTH_COLUMNS} columns, got ${row.length}`);
      }

      const region = decodeRow(row, `${fileName}:${line}`);
      sample.detectRegions.push(region);
      result.associated++;
    }, options);

    console.log(`[LOADER] Boxes associated: ${result.associated}, skipped: ${result.skipped}`);
    return result;
  }

  // -------- Export --------

  /**
   * Split samples, in iteration order, into sample_set_<i>.json files of
   * exactly `chunkSize` samples each. A trailing chunk smaller than
   * `chunkSize` is not written. Returns the written paths.
   */
  exportSamples(
    samples: Map<string, Sample> | Sample[],
    outputDir: string = this.settings.samplesDirectory,
    chunkSize: number = this.settings.maxSampleSetSize,
  ): string[] {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    const sampleList = Array.isArray(samples) ? samples : [...samples.values()];
    const fullChunks = Math.floor(sampleList.length / chunkSize);
    const dropped = sampleList.length - fullChunks * chunkSize;

    fs.mkdirSync(outputDir, { recursive: true });
    const written: string[] = [];
    for (let i = 0; i < fullChunks; i++) {
      const chunk = sampleList.slice(i * chunkSize, (i + 1) * chunkSize);
      written.push(this.writeSamples(chunk, outputDir, i));
    }

    console.log(`[LOADER] Exported ${written.length} sample sets of ${chunkSize} to ${outputDir}`);
    if (dropped > 0) {
      console.log(`[LOADER] ${dropped} samples left over (less than one set), not exported`);
    }
    return written;
  }

  writeSamples(samples: Sample[], outputDir: string, setIndex: number): string {
    const filePath = path.join(outputDir, sampleSetFileName(setIndex));
    const data: SampleSetData = {
      set_index: setIndex,
      samples: samples.map((s) => s.encode()),
    };
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
    return filePath;
  }

  // -------- Sample sets --------

  loadSampleSet(setIndex: number): Sample[] {
    return this.loadSampleSetFromFile(path.join(this.settings.samplesDirectory, sampleSetFileName(setIndex)));
  }

  loadSampleSetFromFile(filePath: string): Sample[] {
    if (!fs.existsSync(filePath)) {
      throw new FileNotFoundError(filePath, 'Have you created the samples first?');
    }

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      throw new MalformedRecordError(`Malformed sample set ${path.basename(filePath)}: ${errorMessage(err)}`);
    }

    const data = parseRecord(sampleSetSchema, json, `sample set ${path.basename(filePath)}`);
    return data.samples.map((raw) => {
      const sample = Sample.decode(raw);
      sample.setIndex = data.set_index;
      return sample;
    });
  }

  /** sample_set_<n>.json files in the samples directory, by index. */
  listSampleSets(): SampleSetFile[] {
    const dir = this.settings.samplesDirectory;
    if (!fs.existsSync(dir)) return [];

    const sets: SampleSetFile[] = [];
    for (const name of fs.readdirSync(dir)) {
      const match = SAMPLE_SET_FILE.exec(name);
      if (match) sets.push({ setIndex: Number(match[1]), file: path.join(dir, name) });
    }
    return sets.sort((a, b) => a.setIndex - b.setIndex);
  }

  loadAllSampleSets(): Sample[] {
    return this.listSampleSets().flatMap((set) => this.loadSampleSetFromFile(set.file));
  }

  // -------- Source files --------

  /**
   * Make sure a source CSV is present, downloading it from `remoteUrl` when
   * one is given. Without a URL a missing file is a FileNotFoundError.
   */
  async ensureSourceFile(filePath: string, remoteUrl?: string): Promise<void> {
    if (fs.existsSync(filePath)) return;
    if (!remoteUrl) {
      throw new FileNotFoundError(filePath, 'Download it first, or pass a remote URL.');
    }

    console.log(`[LOADER] ${filePath} is missing, downloading from ${remoteUrl} (this can take a while)`);
    await downloadToFile(remoteUrl, filePath);
    console.log(`[LOADER] Downloaded ${filePath}`);
  }
}

function decodeRow(row: string[], where: string): DetectRegion {
  try {
    return DetectRegion.decode({
      class_id: row[2],
      confidence: row[3],
      left: row[4],
      right: row[5],
      top: row[6],
      bottom: row[7],
      is_occluded: row[8],
      is_truncated: row[9],
      is_group_of: row[10],
      is_depiction: row[11],
      is_inside: row[12],
    });
  } catch (err) {
    if (err instanceof MalformedRecordError) {
      throw new MalformedRecordError(`${err.message} at ${where}`, err.field);
    }
    throw err;
  }
}

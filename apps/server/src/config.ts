import { z } from 'zod';
import { ConfigError } from './errors';

type Env = Record<string, string | undefined>;

// Blank values in .env count as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const requiredPath = z.preprocess(blankAsUnset, z.string({ required_error: 'not set' }).trim().min(1, 'not set'));

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const optionalUrl = z.preprocess(blankAsUnset, z.string().url().optional());

const EnvSchema = z.object({
  LABELS_FILE: requiredPath,
  GROUND_TRUTH_FILE: requiredPath,
  IMAGE_URL_FILE: requiredPath,
  OUTPUT_DIRECTORY: requiredPath,
  SAMPLES_DIRECTORY: requiredPath,
  STORAGE_DIRECTORY: requiredPath,
  MAX_SAMPLE_SET_SIZE: positiveInt(5000),
  MAX_THREADS: positiveInt(5),
  PORT: positiveInt(4000),
  IMAGE_URL_REMOTE: optionalUrl,
  GROUND_TRUTH_REMOTE: optionalUrl,
});

export interface Settings {
  labelsFile: string;
  groundTruthFile: string;
  imageUrlFile: string;
  outputDirectory: string;
  samplesDirectory: string;
  storageDirectory: string;
  /** Max samples per sample_set_<n>.json */
  maxSampleSetSize: number;
  /** Concurrent image downloads */
  maxThreads: number;
  port: number;
  imageUrlRemote?: string;
  groundTruthRemote?: string;
}

/**
 * Build the settings object once at startup. Callers run dotenv.config()
 * first and pass the result around; nothing reads process.env after this.
 */
export function loadSettings(env: Env = process.env): Readonly<Settings> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return Object.freeze({
    labelsFile: e.LABELS_FILE,
    groundTruthFile: e.GROUND_TRUTH_FILE,
    imageUrlFile: e.IMAGE_URL_FILE,
    outputDirectory: e.OUTPUT_DIRECTORY,
    samplesDirectory: e.SAMPLES_DIRECTORY,
    storageDirectory: e.STORAGE_DIRECTORY,
    maxSampleSetSize: e.MAX_SAMPLE_SET_SIZE,
    maxThreads: e.MAX_THREADS,
    port: e.PORT,
    imageUrlRemote: e.IMAGE_URL_REMOTE,
    groundTruthRemote: e.GROUND_TRUTH_REMOTE,
  });
}

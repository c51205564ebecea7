import { z } from 'zod';
import { MalformedRecordError } from '../errors';

// Accepts numbers and numeric strings (CSV cells), rejects blanks, NaN and Infinity
const float = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());
const int = float.transform((value) => Math.trunc(value));
const flag = int.pipe(z.union([z.literal(0), z.literal(1)]));
const text = z.union([z.string(), z.number()]).transform(String);

export const detectRegionSchema = z.object({
  left: float,
  right: float,
  top: float,
  bottom: float,
  class_id: text,
  confidence: float,
  is_occluded: flag,
  is_truncated: flag,
  is_group_of: flag,
  is_depiction: flag,
  is_inside: flag,
});

export const sampleSchema = z.object({
  key: text,
  remote_path: z.string(),
  detect_regions: z.array(detectRegionSchema),
});

export const sampleSetSchema = z.object({
  set_index: int,
  samples: z.array(z.unknown()),
});

/** Validate `data` against `schema`, reporting the first issue as a MalformedRecordError. */
export function parseRecord<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue.path.join('.');
  throw new MalformedRecordError(
    `Malformed ${what}${field ? ` (${field})` : ''}: ${issue.message}`,
    field || undefined,
  );
}

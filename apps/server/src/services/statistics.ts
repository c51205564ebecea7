import type { Sample } from '../models/sample';

export interface ClassStatistics {
  sampleCount: number;
  /** Boxes per class */
  instances: Record<string, number>;
  /** Samples containing the class at least once */
  appearances: Record<string, number>;
}

export interface ClassCount {
  classId: string;
  label: string;
  count: number;
}

export interface RankedCounts {
  top: ClassCount[];
  /** Sum over every class outside `top` */
  othersCount: number;
}

export function computeClassStatistics(samples: Iterable<Sample>, classIds: Iterable<string> = []): ClassStatistics {
  // Maps, since class ids come from the data and may shadow Object.prototype keys
  const instances = new Map<string, number>();
  const appearances = new Map<string, number>();
  for (const id of classIds) {
    instances.set(id, 0);
    appearances.set(id, 0);
  }

  let sampleCount = 0;
  for (const sample of samples) {
    sampleCount++;
    const seen = new Set<string>();
    for (const { classId } of sample.detectRegions) {
      instances.set(classId, (instances.get(classId) ?? 0) + 1);
      if (!seen.has(classId)) {
        seen.add(classId);
        appearances.set(classId, (appearances.get(classId) ?? 0) + 1);
      }
    }
  }

  return {
    sampleCount,
    instances: Object.fromEntries(instances),
    appearances: Object.fromEntries(appearances),
  };
}

export function rankClassCounts(
  counts: Record<string, number>,
  limit: number,
  getLabel: (classId: string) => string = (id) => id,
): RankedCounts {
  const sorted = Object.entries(counts).sort(([idA, a], [idB, b]) => b - a || idA.localeCompare(idB));
  const top = sorted.slice(0, limit).map(([classId, count]) => ({ classId, label: getLabel(classId), count }));
  const othersCount = sorted.slice(limit).reduce((sum, [, count]) => sum + count, 0);
  return { top, othersCount };
}

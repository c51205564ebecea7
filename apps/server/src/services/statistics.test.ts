import { describe, expect, it } from 'vitest';
import { DetectRegion } from '../models/detect-region';
import { Sample } from '../models/sample';
import { computeClassStatistics, rankClassCounts } from './statistics';

const box = (classId: string) => new DetectRegion({ left: 0.1, right: 0.2, top: 0.1, bottom: 0.2 }, { classId });

const sampleWith = (key: string, classIds: string[]) => {
  const sample = new Sample(key, `http://x/${key}.jpg`);
  sample.detectRegions.push(...classIds.map(box));
  return sample;
};

describe('computeClassStatistics', () => {
  it('counts boxes and the samples they appear in', () => {
    const stats = computeClassStatistics([
      sampleWith('a', ['/m/dog', '/m/dog', '/m/cat']),
      sampleWith('b', ['/m/dog']),
      sampleWith('c', []),
    ]);

    expect(stats.sampleCount).toBe(3);
    expect(stats.instances).toEqual({ '/m/dog': 3, '/m/cat': 1 });
    expect(stats.appearances).toEqual({ '/m/dog': 2, '/m/cat': 1 });
  });

  it('reports known classes that never occur as zero', () => {
    const stats = computeClassStatistics([sampleWith('a', ['/m/dog'])], ['/m/dog', '/m/bird']);
    expect(stats.instances).toEqual({ '/m/dog': 1, '/m/bird': 0 });
    expect(stats.appearances).toEqual({ '/m/dog': 1, '/m/bird': 0 });
  });

  it('counts class ids that collide with object keys', () => {
    const stats = computeClassStatistics([
      sampleWith('a', ['constructor', '__proto__', 'constructor']),
      sampleWith('b', ['toString']),
    ]);

    expect(Object.entries(stats.instances)).toEqual([['constructor', 2], ['__proto__', 1], ['toString', 1]]);
    expect(Object.entries(stats.appearances)).toEqual([['constructor', 1], ['__proto__', 1], ['toString', 1]]);
    expect(rankClassCounts(stats.instances, 1).top).toEqual([{ classId: 'constructor', label: 'constructor', count: 2 }]);
  });
});

describe('rankClassCounts', () => {
  it('keeps the largest counts and sums the rest', () => {
    const ranked = rankClassCounts({ '/m/a': 2, '/m/b': 9, '/m/c': 5, '/m/d': 1 }, 2);
    expect(ranked.top).toEqual([
      { classId: '/m/b', label: '/m/b', count: 9 },
      { classId: '/m/c', label: '/m/c', count: 5 },
    ]);
    expect(ranked.othersCount).toBe(3);
  });

  it('breaks ties by class id and labels through the lookup', () => {
    const labels: Record<string, string> = { '/m/x': 'Xylophone', '/m/y': 'Yak' };
    const ranked = rankClassCounts({ '/m/y': 4, '/m/x': 4 }, 5, (id) => labels[id] ?? id);
    expect(ranked.top.map((c) => c.label)).toEqual(['Xylophone', 'Yak']);
    expect(ranked.othersCount).toBe(0);
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Sample } from '../models/sample';
import { ImageStore } from './image-store';
import { loadSampleImages } from './image-loader';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bulk-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadSampleImages', () => {
  it('downloads only missing images and counts failures', async () => {
    const store = new ImageStore(dir);
    const samples = ['a', 'b', 'c', 'd'].map((key) => {
      const sample = new Sample(key, `https://images.example.com/${key}.jpg`);
      sample.setIndex = 0;
      return sample;
    });

    fs.mkdirSync(store.getSetPath(0), { recursive: true });
    fs.writeFileSync(store.getImagePath(samples[0]), 'cached');

    const fetchMock = vi.fn(async (url: string) =>
      url.endsWith('/c.jpg') ? new Response('', { status: 500 }) : new Response(`image ${url}`),
    );
    vi.stubGlobal('fetch', fetchMock);

    const progress: number[] = [];
    const summary = await loadSampleImages(samples, store, {
      maxThreads: 2,
      onProgress: (done) => progress.push(done),
    });

    expect(summary).toEqual({ total: 4, alreadyLoaded: 1, loaded: 2, failed: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(progress).toEqual([1, 2, 3]);
    expect(store.isLocallyLoaded(samples[1])).toBe(true);
    expect(store.isLocallyLoaded(samples[2])).toBe(false);
  });
});

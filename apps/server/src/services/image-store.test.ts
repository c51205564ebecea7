import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Sample } from '../models/sample';
import { ImageStore } from './image-store';

let dir: string;
let store: ImageStore;

const sampleInSet = (key: string, setIndex: number) => {
  const sample = new Sample(key, `https://images.example.com/${key}.jpg`);
  sample.setIndex = setIndex;
  return sample;
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'images-'));
  store = new ImageStore(dir);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('ImageStore', () => {
  it('lays images out by set index and key', () => {
    expect(store.getSetPath(3)).toBe(path.join(dir, 'sample_images', 'set_3'));
    expect(store.getImagePath(sampleInSet('abc', 3))).toBe(path.join(dir, 'sample_images', 'set_3', 'abc.jpg'));
  });

  it('needs a set index to place an image', () => {
    expect(() => store.getImagePath(new Sample('abc', 'https://images.example.com/abc.jpg'))).toThrow('abc');
  });

  it('checks the filesystem on every call', () => {
    const sample = sampleInSet('abc', 0);
    expect(store.isLocallyLoaded(sample)).toBe(false);

    fs.mkdirSync(store.getSetPath(0), { recursive: true });
    fs.writeFileSync(store.getImagePath(sample), 'jpeg');
    expect(store.isLocallyLoaded(sample)).toBe(true);
  });

  it('downloads a missing image', async () => {
    const fetchMock = vi.fn(async () => new Response('jpeg-bytes'));
    vi.stubGlobal('fetch', fetchMock);
    const sample = sampleInSet('abc', 1);

    await expect(store.load(sample)).resolves.toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('https://images.example.com/abc.jpg');
    expect(fs.readFileSync(store.getImagePath(sample), 'utf8')).toBe('jpeg-bytes');
    expect(fs.existsSync(`${store.getImagePath(sample)}.part`)).toBe(false);
  });

  it('does not fetch an image that is already cached', async () => {
    const fetchMock = vi.fn(async () => new Response('new'));
    vi.stubGlobal('fetch', fetchMock);
    const sample = sampleInSet('abc', 1);
    fs.mkdirSync(store.getSetPath(1), { recursive: true });
    fs.writeFileSync(store.getImagePath(sample), 'old');

    await expect(store.load(sample)).resolves.toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(fs.readFileSync(store.getImagePath(sample), 'utf8')).toBe('old');
  });

  it('logs an HTTP error and leaves the sample unloaded', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404, statusText: 'Not Found' })));
    const sample = sampleInSet('abc', 1);

    await expect(store.load(sample)).resolves.toBe(false);
    expect(store.isLocallyLoaded(sample)).toBe(false);
    expect(console.error).toHaveBeenCalledWith('[IMAGES] Failed to fetch https://images.example.com/abc.jpg: HTTP 404 Not Found');
  });

  it('survives a network error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
    const sample = sampleInSet('abc', 2);

    await expect(store.load(sample)).resolves.toBe(false);
    expect(store.isLocallyLoaded(sample)).toBe(false);
  });
});

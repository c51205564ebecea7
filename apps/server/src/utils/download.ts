import fs from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

/**
 * Stream `url` into `destination`, creating parent directories.
 * The body lands in `<destination>.part` first and is renamed once complete,
 * so an interrupted download never leaves a file at `destination`.
 */
export async function downloadToFile(url: string, destination: string): Promise<void> {
  const res = await fetch(url);
  if (!res.ok || !res.body) {
    throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
  }

  await fs.promises.mkdir(path.dirname(destination), { recursive: true });
  const partial = `${destination}.part`;
  try {
    await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(partial));
    await fs.promises.rename(partial, destination);
  } catch (err) {
    await fs.promises.rm(partial, { force: true });
    throw err;
  }
}

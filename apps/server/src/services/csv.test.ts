import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileNotFoundError, MalformedRecordError } from '../errors';
import { countRows, executeOnCsv } from './csv';

let dir: string;

const write = (name: string, content: string) => {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
};

const collect = async (filePath: string, skipFirstRow = false) => {
  const rows: Array<[string[], number]> = [];
  const count = await executeOnCsv(filePath, (row, line) => rows.push([row, line]), { skipFirstRow });
  return { rows, count };
};

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('countRows', () => {
  it('counts a final row without a newline', async () => {
    expect(await countRows(write('a.csv', 'a\nb\nc'))).toBe(3);
    expect(await countRows(write('b.csv', 'a\nb\n'))).toBe(2);
    expect(await countRows(write('c.csv', ''))).toBe(0);
  });
});

describe('executeOnCsv', () => {
  it('hands every row to the action in file order with its line number', async () => {
    const { rows, count } = await collect(write('rows.csv', 'a,1\nb,2,extra\nc,3\n'));
    expect(count).toBe(3);
    expect(rows).toEqual([[['a', '1'], 1], [['b', '2', 'extra'], 2], [['c', '3'], 3]]);
    expect(console.log).toHaveBeenCalledWith('[CSV] Reading rows.csv: 3 rows');
  });

  it('skips the header row', async () => {
    const { rows, count } = await collect(write('rows.csv', 'ImageID,Url\na,1\nb,2\n'), true);
    expect(count).toBe(2);
    expect(rows).toEqual([[['a', '1'], 2], [['b', '2'], 3]]);
  });

  it('reads quoted fields', async () => {
    const { rows } = await collect(write('labels.csv', '/m/01,"Dog, domestic"\n'));
    expect(rows).toEqual([[['/m/01', 'Dog, domestic'], 1]]);
  });

  it('stops at the first error thrown by the action', async () => {
    const filePath = write('rows.csv', 'a\nb\nc\n');
    const seen: string[] = [];
    const run = executeOnCsv(filePath, ([value]) => {
      seen.push(value);
      if (value === 'b') throw new Error('bad row');
    });
    await expect(run).rejects.toThrow('bad row');
    expect(seen).toEqual(['a', 'b']);
  });

  it('closes the file when the action throws', async () => {
    const filePath = write('big.csv', Array.from({ length: 50_000 }, (_, i) => `img${i},${i}`).join('\n'));
    const open = vi.spyOn(fs, 'createReadStream');

    await expect(executeOnCsv(filePath, () => { throw new Error('bad row'); })).rejects.toThrow('bad row');

    const source = open.mock.results.at(-1);
    expect(source?.type).toBe('return');
    expect(source?.value.destroyed).toBe(true);
  });

  it('reports unparseable CSV as a malformed record', async () => {
    const run = executeOnCsv(write('broken.csv', 'a,1\nb,"open\n'), () => {});
    await expect(run).rejects.toBeInstanceOf(MalformedRecordError);
    await expect(run).rejects.toThrow('Malformed CSV at broken.csv');
  });

  it('fails on a missing file', async () => {
    await expect(executeOnCsv(path.join(dir, 'missing.csv'), () => {})).rejects.toBeInstanceOf(FileNotFoundError);
  });
});

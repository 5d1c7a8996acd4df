import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { loadRecords, saveRecords, writeTextFile } from '../../src/store/json-file.js';
import { PersistenceError } from '../../src/utils/errors.js';
import { createTempDir } from '../helpers.js';

const schema = z.array(z.object({ name: z.string(), phone: z.string() }));

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
});

afterEach(async () => {
  await cleanup();
});

describe('loadRecords', () => {
  it('should return an empty list without a warning for a missing file', async () => {
    const result = await loadRecords(path.join(dir, 'missing.json'), schema);
    expect(result).toEqual({ records: [] });
  });

  it('should return an empty list and a warning for malformed JSON', async () => {
    const filePath = path.join(dir, 'broken.json');
    await fs.writeFile(filePath, '[{"name": "Acme",', 'utf-8');

    const result = await loadRecords(filePath, schema);

    expect(result.records).toEqual([]);
    expect(result.warning).toBeInstanceOf(PersistenceError);
    expect(result.warning?.kind).toBe('PersistenceError');
    expect(result.warning?.message).toContain('malformed JSON');
  });

  it('should leave a malformed file untouched', async () => {
    const filePath = path.join(dir, 'broken.json');
    await fs.writeFile(filePath, 'not json', 'utf-8');

    await loadRecords(filePath, schema);

    expect(await fs.readFile(filePath, 'utf-8')).toBe('not json');
  });

  it('should warn when the JSON has the wrong shape', async () => {
    const filePath = path.join(dir, 'object.json');
    await fs.writeFile(filePath, '{"name": "Acme", "phone": "555-0100"}', 'utf-8');

    const result = await loadRecords(filePath, schema);

    expect(result.records).toEqual([]);
    expect(result.warning?.message).toContain('unexpected content');
  });

  it('should name the offending element for a bad field', async () => {
    const filePath = path.join(dir, 'bad-field.json');
    await fs.writeFile(filePath, '[{"name": "Acme", "phone": 5550100}]', 'utf-8');

    const result = await loadRecords(filePath, schema);

    expect(result.warning?.message).toContain('at 0.phone');
  });

  it('should warn when the path cannot be read as a file', async () => {
    const result = await loadRecords(dir, schema);
    expect(result.records).toEqual([]);
    expect(result.warning?.message).toContain('could not read file');
  });
});

describe('saveRecords', () => {
  it('should round-trip records in order', async () => {
    const filePath = path.join(dir, 'records.json');
    const records = [
      { name: 'Acme', phone: '555-0100' },
      { name: 'Zoë', phone: '555-0199' },
    ];

    await saveRecords(filePath, records);
    const result = await loadRecords(filePath, schema);

    expect(result).toEqual({ records });
  });

  it('should write pretty-printed UTF-8 with literal non-ASCII', async () => {
    const filePath = path.join(dir, 'records.json');
    await saveRecords(filePath, [{ name: 'Zoë', phone: '1' }]);

    expect(await fs.readFile(filePath, 'utf-8')).toBe('[\n  {\n    "name": "Zoë",\n    "phone": "1"\n  }\n]');
  });

  it('should throw PersistenceError when the directory is missing', async () => {
    const filePath = path.join(dir, 'nope', 'records.json');
    await expect(saveRecords(filePath, [])).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('writeTextFile', () => {
  it('should include the path in the error', async () => {
    const filePath = path.join(dir, 'nope', 'out.txt');
    await expect(writeTextFile(filePath, 'x')).rejects.toThrow(filePath);
  });
});

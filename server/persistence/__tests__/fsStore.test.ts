import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFsExportStore, normalizeFilename } from '../fsStore';

describe('createFsExportStore', () => {
  let rootDir: string;
  const now = () => new Date(2026, 2, 5, 9, 30, 0);

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'page-categorizer-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('writes under a dated directory per kind', async () => {
    const store = createFsExportStore({ export: { rootDir } }, now);

    const target = await store.write('json', 'my report.json', 'json', '{}');

    expect(target).toBe(path.join(rootDir, '2026', '03', '05', 'json', 'my_report.json'));
    await expect(fs.readFile(target, 'utf-8')).resolves.toBe('{}');
  });

  it('keeps path segments in the filename from leaving the directory', async () => {
    const store = createFsExportStore({ export: { rootDir } }, now);

    const target = await store.write('reports', '../../evil', 'txt', 'x');

    expect(path.dirname(target)).toBe(path.join(rootDir, '2026', '03', '05', 'reports'));
  });
});

describe('normalizeFilename', () => {
  it('appends the extension only once', () => {
    expect(normalizeFilename('data.csv', 'csv')).toBe('data.csv');
    expect(normalizeFilename('data', 'csv')).toBe('data.csv');
    expect(normalizeFilename('', 'csv')).toBe('export.csv');
  });
});

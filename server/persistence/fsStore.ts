import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ExportKind, ExportStore } from '../../shared/exportStore';

const sanitizeSegment = (value: string): string => value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'export';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of export root: ${target}`);
  }
};

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `YYYY/MM/DD` in local time. */
export const datePath = (date: Date): string =>
  path.join(String(date.getFullYear()), pad2(date.getMonth() + 1), pad2(date.getDate()));

/** Strips a trailing `.ext`, sanitizes the rest and appends `.ext` again. */
export const normalizeFilename = (filename: string, extension: string): string => {
  const suffix = `.${extension}`;
  const base = filename.toLowerCase().endsWith(suffix) ? filename.slice(0, -suffix.length) : filename;
  return `${sanitizeSegment(base)}${suffix}`;
};

/**
 * File-system export store laid out as `<rootDir>/YYYY/MM/DD/<kind>/<file>`.
 * Write errors propagate to the caller.
 */
export const createFsExportStore = (
  config: Pick<AppConfig, 'export'>,
  now: () => Date = () => new Date(),
): ExportStore => {
  const root = path.resolve(config.export.rootDir);

  const write = async (kind: ExportKind, filename: string, extension: string, contents: string) => {
    const dir = path.join(root, datePath(now()), kind);
    const target = path.join(dir, normalizeFilename(filename, extension));
    guardPath(root, target);
    await ensureDir(dir);
    await fs.writeFile(target, contents, 'utf-8');
    return target;
  };

  return { write };
};

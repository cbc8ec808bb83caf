/**
 * File I/O utilities
 */

import { mkdir, writeFile, readFile, access } from 'fs/promises';
import { join, dirname } from 'path';
import { constants } from 'fs';

export type CsvValue = string | number | boolean | null;

export async function ensureDir(dir_path: string): Promise<void> {
  await mkdir(dir_path, { recursive: true });
}

export async function writeJson(file_path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, JSON.stringify(data, null, 2), 'utf-8');
}

/** Parsed but unvalidated; callers run the result through a schema */
export async function readJson(file_path: string): Promise<unknown> {
  const content = await readFile(file_path, 'utf-8');
  return JSON.parse(content);
}

export async function fileExists(file_path: string): Promise<boolean> {
  try {
    await access(file_path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function toCsv(rows: readonly Record<string, CsvValue>[]): string {
  if (rows.length === 0) {
    return '';
  }

  const headers = Object.keys(rows[0]);
  const csv_lines = [
    headers.join(','),
    ...rows.map((row) =>
      headers
        .map((h) => {
          const val = row[h];
          if (val === null || val === undefined) return '';
          if (typeof val === 'string' && /[",\n]/.test(val)) {
            return `"${val.replace(/"/g, '""')}"`;
          }
          return String(val);
        })
        .join(',')
    ),
  ];
  return csv_lines.join('\n');
}

export async function writeCsv(
  file_path: string,
  rows: readonly Record<string, CsvValue>[]
): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, toCsv(rows), 'utf-8');
}

export function getOutputDir(): string {
  return join(process.cwd(), 'out');
}

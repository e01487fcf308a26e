import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { EXPORT_FIELDS } from '../scheduler/aggregator.js';
import type { ExportRow } from '../scheduler/aggregator.js';

export function toJsonl(rows: readonly ExportRow[]): string {
  return rows.map((row) => `${JSON.stringify(row)}\n`).join('');
}

/** RFC 4180 field: quoted when it holds a comma, quote or line break. */
function csvField(value: string | number | boolean): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_FIELDS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_FIELDS.map((field) => csvField(row[field])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

async function writeWhole(path: string, content: string): Promise<string> {
  const absolute = resolve(path);
  await mkdir(dirname(absolute), { recursive: true });
  await writeFile(absolute, content, 'utf8');
  return absolute;
}

export function exportJsonl(path: string, rows: readonly ExportRow[]): Promise<string> {
  return writeWhole(path, toJsonl(rows));
}

export function exportCsv(path: string, rows: readonly ExportRow[]): Promise<string> {
  return writeWhole(path, toCsv(rows));
}

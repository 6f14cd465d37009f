/**
 * metaprompt-lab - Output Store
 *
 * One run directory per task/strategy:
 *   run.json     manifest (arguments, strategy, prompt configuration)
 *   0000.json    OutputRecord for example 0
 *   0000.txt     extracted answer for example 0 (completed examples only)
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { getErrorMessage } from '../core/errors.js';
import { RUN_MANIFEST_FILE } from '../config/constants.js';
import type { OutputRecord, RunManifest } from '../types/index.js';

export function runDirectoryName(task: string, strategy: string, freshEyes: boolean): string {
  return `${task}-${strategy}${freshEyes ? '-fresh-eyes' : ''}`;
}

export function recordBaseName(index: number): string {
  return String(index).padStart(4, '0');
}

export async function prepareRunDirectory(outputDirectory: string, name: string): Promise<string> {
  const directory = path.join(outputDirectory, name);
  await mkdir(directory, { recursive: true });
  return directory;
}

export async function writeManifest(directory: string, manifest: RunManifest): Promise<void> {
  await writeFile(path.join(directory, RUN_MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
}

export async function writeOutputRecord(directory: string, record: OutputRecord): Promise<void> {
  const base = path.join(directory, recordBaseName(record.index));
  await writeFile(`${base}.json`, JSON.stringify(record, null, 2) + '\n', 'utf-8');
  if (record.status === 'completed' && record.answer !== null) {
    await writeFile(`${base}.txt`, record.answer, 'utf-8');
  }
}

/**
 * The fields of a record the evaluator depends on
 */
export type StoredRecord = Pick<OutputRecord, 'index' | 'input' | 'target' | 'status' | 'answer'>;

export type ReadResult =
  | { file: string; record: StoredRecord }
  | { file: string; error: string };

function toStoredRecord(value: unknown): StoredRecord | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('index' in value) || typeof value.index !== 'number') return null;
  if (!('input' in value) || typeof value.input !== 'string') return null;
  if (!('status' in value) || (value.status !== 'completed' && value.status !== 'failed')) return null;

  const target = 'target' in value && typeof value.target === 'string' ? value.target : null;
  const answer = 'answer' in value && typeof value.answer === 'string' ? value.answer : null;
  return { index: value.index, input: value.input, target, status: value.status, answer };
}

/**
 * Read every record of a run directory in file-name order. Files that
 * cannot be parsed are reported, not thrown.
 */
export async function readOutputRecords(directory: string): Promise<ReadResult[]> {
  const files = (await readdir(directory))
    .filter(file => file.endsWith('.json') && file !== RUN_MANIFEST_FILE)
    .sort();

  const results: ReadResult[] = [];
  for (const file of files) {
    const filePath = path.join(directory, file);
    try {
      const record = toStoredRecord(JSON.parse(await readFile(filePath, 'utf-8')));
      results.push(record ? { file: filePath, record } : { file: filePath, error: 'not an output record' });
    } catch (error: unknown) {
      results.push({ file: filePath, error: getErrorMessage(error) });
    }
  }
  return results;
}

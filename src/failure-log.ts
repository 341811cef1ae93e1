import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { isNotFound } from './state-store.js';
import type { FailureLogEntry } from './types.js';

const entrySchema = z.object({
  domain: z.string(),
  phase: z.enum(['registration', 'dns', 'verification', 'aliases']),
  message: z.string(),
  timestamp: z.string(),
});

/** Append one entry as a JSON line. The file only ever grows. */
export async function appendFailure(filePath: string, entry: FailureLogEntry): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await appendFile(filePath, JSON.stringify(entry) + '\n', 'utf8');
}

export async function readFailureLog(filePath: string): Promise<FailureLogEntry[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  return raw
    .split('\n')
    .filter((line) => line.trim())
    .map((line): FailureLogEntry => entrySchema.parse(JSON.parse(line)));
}

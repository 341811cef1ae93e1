import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StateStoreError } from './errors.js';
import { logger } from './logger.js';
import type { DomainRecord, Stage } from './types.js';

const phaseSchema = z.enum(['registration', 'dns', 'verification', 'aliases']);

const stateSchema = z.union([
  z.object({
    status: z.enum([
      'Pending',
      'ProviderRegistered',
      'DnsConfigured',
      'Verified',
      'AliasesCreated',
      'Completed',
    ]),
  }),
  z.object({ status: z.literal('Failed'), phase: phaseSchema }),
]);

const recordSchema = z.object({
  name: z.string().min(1),
  state: stateSchema,
  providerId: z.string().default(''),
  verificationToken: z.string().default(''),
  hasMxRecord: z.boolean().default(false),
  hasTxtRecord: z.boolean().default(false),
  aliases: z.array(z.string()).default([]),
  errors: z
    .array(z.object({ timestamp: z.string(), phase: phaseSchema, message: z.string() }))
    .default([]),
  attemptCounts: z
    .object({
      registration: z.number().int().optional(),
      dns: z.number().int().optional(),
      verification: z.number().int().optional(),
      aliases: z.number().int().optional(),
    })
    .default({}),
});

const fileSchema = z.object({
  version: z.literal(1),
  domains: z.array(recordSchema),
});

export interface StateStoreOptions {
  /** Never write to disk (dry runs) */
  readOnly?: boolean;
}

/**
 * Domain records keyed by name, persisted as a single JSON snapshot.
 *
 * Saves write a temp file next to the target and rename it over, so the
 * state file is always either the previous or the new snapshot.
 */
export class StateStore {
  private readonly records = new Map<string, DomainRecord>();
  private readonly readOnly: boolean;

  constructor(
    readonly filePath: string,
    options: StateStoreOptions = {}
  ) {
    this.readOnly = options.readOnly ?? false;
  }

  /** Load records from disk. A missing file leaves the store empty. */
  async load(): Promise<DomainRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        this.records.clear();
        return [];
      }
      throw new StateStoreError(`Cannot read state file ${this.filePath}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateStoreError(`State file ${this.filePath} is not valid JSON`, err);
    }

    const parsed = fileSchema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new StateStoreError(`State file ${this.filePath} is invalid: ${detail}`);
    }

    this.records.clear();
    for (const record of parsed.data.domains) {
      if (this.records.has(record.name)) {
        throw new StateStoreError(
          `State file ${this.filePath} lists ${record.name} more than once`
        );
      }
      this.records.set(record.name, record);
    }
    return this.all();
  }

  get(name: string): DomainRecord | undefined {
    return this.records.get(name);
  }

  /** Insert or replace a record by name. */
  upsert(record: DomainRecord): void {
    this.records.set(record.name, record);
  }

  all(): DomainRecord[] {
    return [...this.records.values()];
  }

  /** Records in a given status (`Failed` matches every failed phase) */
  byStatus(status: Stage | 'Failed'): DomainRecord[] {
    return this.all().filter((r) => r.state.status === status);
  }

  /** Atomically write the full snapshot. */
  async save(): Promise<void> {
    if (this.readOnly) {
      logger.debug('state_save_skipped', { file: this.filePath });
      return;
    }
    const body = JSON.stringify({ version: 1, domains: this.all() }, null, 2) + '\n';
    await writeFileAtomic(this.filePath, body);
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Write to `<file>.tmp-<pid>-<time>` then rename over `file`. */
export async function writeFileAtomic(filePath: string, body: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await writeFile(tmpPath, body, 'utf8');
  await rename(tmpPath, filePath);
}

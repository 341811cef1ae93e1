import { mkdtemp, readFile, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import { StateStoreError } from '../src/errors.js';
import { createDomainRecord } from '../src/lifecycle.js';
import { StateStore } from '../src/state-store.js';

let dir: string;
let file: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'state-'));
  file = path.join(dir, 'nested', 'state.json');
});

describe('StateStore', () => {
  it('starts empty when the file does not exist', async () => {
    const store = new StateStore(file);
    await expect(store.load()).resolves.toEqual([]);
    expect(store.all()).toEqual([]);
  });

  it('saves a snapshot that a new store loads back', async () => {
    const store = new StateStore(file);
    const record = createDomainRecord('a.test');
    record.state = { status: 'Failed', phase: 'dns' };
    record.providerId = 'fe-1';
    record.errors.push({ timestamp: '2026-01-01T00:00:00.000Z', phase: 'dns', message: 'boom' });
    record.attemptCounts.dns = 2;
    store.upsert(record);
    store.upsert(createDomainRecord('b.test'));
    await store.save();

    const reloaded = new StateStore(file);
    await reloaded.load();

    expect(reloaded.get('a.test')).toEqual(record);
    expect(reloaded.byStatus('Pending').map((r) => r.name)).toEqual(['b.test']);
    expect(reloaded.byStatus('Failed').map((r) => r.name)).toEqual(['a.test']);
  });

  it('replaces records by name on upsert', () => {
    const store = new StateStore(file);
    store.upsert(createDomainRecord('a.test'));
    const updated = createDomainRecord('a.test');
    updated.providerId = 'fe-9';
    store.upsert(updated);

    expect(store.all()).toHaveLength(1);
    expect(store.get('a.test')?.providerId).toBe('fe-9');
  });

  it('leaves no temporary files behind', async () => {
    const store = new StateStore(file);
    store.upsert(createDomainRecord('a.test'));
    await store.save();
    await store.save();

    expect(await readdir(path.dirname(file))).toEqual(['state.json']);
    const body = JSON.parse(await readFile(file, 'utf8'));
    expect(body.version).toBe(1);
    expect(body.domains).toHaveLength(1);
  });

  it('refuses to load a corrupt file', async () => {
    await writeFile(path.join(dir, 'bad.json'), '{ not json');
    const store = new StateStore(path.join(dir, 'bad.json'));
    await expect(store.load()).rejects.toThrow(StateStoreError);
  });

  it('refuses unknown states', async () => {
    const bad = path.join(dir, 'bad-state.json');
    await writeFile(
      bad,
      JSON.stringify({ version: 1, domains: [{ name: 'a.test', state: { status: 'Exploded' } }] })
    );
    await expect(new StateStore(bad).load()).rejects.toThrow(/is invalid/);
  });

  it('refuses duplicate domain names', async () => {
    const dup = path.join(dir, 'dup.json');
    const record = createDomainRecord('a.test');
    await writeFile(dup, JSON.stringify({ version: 1, domains: [record, record] }));
    await expect(new StateStore(dup).load()).rejects.toThrow('lists a.test more than once');
  });

  it('fills defaults for fields missing from older files', async () => {
    const old = path.join(dir, 'old.json');
    await writeFile(
      old,
      JSON.stringify({ version: 1, domains: [{ name: 'a.test', state: { status: 'Verified' } }] })
    );
    const store = new StateStore(old);
    await store.load();
    expect(store.get('a.test')).toEqual({
      ...createDomainRecord('a.test'),
      state: { status: 'Verified' },
    });
  });

  it('never writes in read-only mode', async () => {
    const store = new StateStore(file, { readOnly: true });
    store.upsert(createDomainRecord('a.test'));
    await store.save();
    await expect(readdir(dir)).resolves.toEqual([]);
  });
});

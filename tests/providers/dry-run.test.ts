import { describe, expect, it } from 'vitest';
import { dryRunDnsHost, dryRunForwarding, isDryRunId } from '../../src/providers/dry-run.js';
import { FakeDnsHost, FakeForwarding } from '../fakes.js';

describe('dryRunForwarding', () => {
  it('gives new domains synthetic ids without calling the provider', async () => {
    const provider = dryRunForwarding();

    const id = await provider.addDomain('a.test');

    expect(id).toBe('dry-run:a.test');
    expect(isDryRunId(id)).toBe(true);
    expect(await provider.enableProtection(id)).toBe('dry-run:token');
    expect(await provider.getDomainStatus(id)).toEqual({ hasMxRecord: true, hasTxtRecord: true });
    expect(await provider.listAliases(id)).toEqual([]);
    expect(await provider.createAlias(id, 'anna', 'inbox@example.com')).toBe('created');
  });

  it('reuses the real id of a domain that already exists and never writes', async () => {
    const inner = new FakeForwarding();
    const existing = inner.seed('a.test', ['info', 'anna']);
    const provider = dryRunForwarding(inner);

    const id = await provider.addDomain('a.test');
    await provider.enableProtection(id);
    await provider.createAlias(id, 'bo', 'inbox@example.com');

    expect(id).toBe(existing.id);
    expect(await provider.listAliases(id)).toEqual(['info', 'anna']);
    expect(inner.mutatingCalls).toEqual([]);
  });
});

describe('dryRunDnsHost', () => {
  it('reports writes as unchanged without touching the inner host', async () => {
    const inner = new FakeDnsHost();
    inner.addZone('a.test');
    const host = dryRunDnsHost(inner);

    const outcome = await host.upsertRecord('a.test', {
      type: 'MX',
      name: 'a.test',
      value: 'mx1.forwardemail.net',
      priority: 10,
    });

    expect(outcome).toBe('unchanged');
    expect(inner.mutatingCalls).toEqual([]);
    expect(await host.getRecords('a.test', 'a.test')).toEqual([]);
  });

  it('invents a zone when there is no inner host', async () => {
    expect(await dryRunDnsHost().findZone('a.test')).toEqual({ id: 'dry-run:a.test', name: 'a.test' });
  });
});

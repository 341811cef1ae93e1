import { beforeEach, describe, expect, it } from 'vitest';
import { auditDomain, auditDomains, classify } from '../src/audit.js';
import { FakeDnsHost, FakeForwarding, transient } from './fakes.js';

let forwarding: FakeForwarding;
let dns: FakeDnsHost;

const aliases = (n: number) => ['info', ...Array.from({ length: n - 1 }, (_, i) => `user${i}`)];

function configuredZone(domain: string, token: string) {
  dns.addZone(domain, [
    { type: 'TXT', name: domain, value: `"forward-email-site-verification=${token}"` },
    { type: 'TXT', name: domain, value: '"forward-email=inbox@example.com"' },
    { type: 'MX', name: domain, value: 'mx1.forwardemail.net', priority: 10 },
    { type: 'MX', name: domain, value: 'mx2.forwardemail.net', priority: 10 },
  ]);
}

beforeEach(() => {
  forwarding = new FakeForwarding();
  dns = new FakeDnsHost();
});

const options = () => ({ forwarding, dns, aliasCount: 50 });

describe('classify', () => {
  const none = {
    providerDomain: false,
    providerVerified: false,
    aliasCount: false,
    dnsZone: false,
    txtRecord: false,
    mxRecords: false,
  };

  it('needs every check for FullyConfigured', () => {
    const all = {
      providerDomain: true,
      providerVerified: true,
      aliasCount: true,
      dnsZone: true,
      txtRecord: true,
      mxRecords: true,
    };
    expect(classify(all, { provider: false, zone: false })).toBe('FullyConfigured');
    expect(classify({ ...all, mxRecords: false }, { provider: false, zone: false })).toBe(
      'PartiallyConfigured'
    );
  });

  it('needs confirmed absence on both sides for NotConfigured', () => {
    expect(classify(none, { provider: true, zone: true })).toBe('NotConfigured');
    expect(classify(none, { provider: true, zone: false })).toBe('PartiallyConfigured');
  });
});

describe('auditDomain', () => {
  it('reports a fully configured domain with no issues', async () => {
    forwarding.seed('a.test', aliases(50));
    configuredZone('a.test', 'token-a.test');

    const result = await auditDomain('a.test', options());

    expect(result).toEqual({
      domain: 'a.test',
      classification: 'FullyConfigured',
      checks: {
        providerDomain: true,
        providerVerified: true,
        aliasCount: true,
        dnsZone: true,
        txtRecord: true,
        mxRecords: true,
      },
      aliasCount: 50,
      issues: [],
    });
  });

  it('flags a domain present at the provider but missing from the DNS host', async () => {
    forwarding.seed('a.test', aliases(50));

    const result = await auditDomain('a.test', options());

    expect(result.classification).toBe('PartiallyConfigured');
    expect(result.checks.dnsZone).toBe(false);
    expect(result.checks.txtRecord).toBe(false);
    expect(result.checks.mxRecords).toBe(false);
    expect(result.issues).toEqual(['DNS zone not found at DNS host']);
  });

  it('classifies a domain unknown to both services as NotConfigured', async () => {
    const result = await auditDomain('ghost.test', options());

    expect(result.classification).toBe('NotConfigured');
    expect(result.issues).toEqual([
      'Domain not found at forwarding provider',
      'DNS zone not found at DNS host',
    ]);
  });

  it('lists each missing piece of a partial setup', async () => {
    forwarding.seed('a.test', aliases(12));
    forwarding.statuses.set('a.test', { hasMxRecord: true, hasTxtRecord: false });
    dns.addZone('a.test', [{ type: 'MX', name: 'a.test', value: 'mx1.forwardemail.net', priority: 10 }]);

    const result = await auditDomain('a.test', options());

    expect(result.classification).toBe('PartiallyConfigured');
    expect(result.aliasCount).toBe(12);
    expect(result.issues).toEqual([
      'Provider has not detected the TXT record',
      'Only 12 of 50 aliases present',
      'TXT verification record missing',
      'MX record missing: mx2.forwardemail.net',
    ]);
  });

  it('notices a TXT record that does not carry the provider token', async () => {
    forwarding.seed('a.test', aliases(50));
    configuredZone('a.test', 'stale-token');

    const result = await auditDomain('a.test', options());

    expect(result.checks.txtRecord).toBe(false);
    expect(result.issues).toEqual(['TXT verification record does not match provider token']);
  });

  it('turns lookup errors into issues instead of throwing', async () => {
    configuredZone('a.test', 'token-a.test');
    forwarding.failOn = (method) => (method === 'findDomain' ? transient('timeout') : undefined);

    const result = await auditDomain('a.test', options());

    expect(result.classification).toBe('PartiallyConfigured');
    expect(result.checks.providerDomain).toBe(false);
    expect(result.issues).toEqual(['Provider lookup failed: timeout']);
  });

  it('never writes to either service', async () => {
    forwarding.seed('a.test', aliases(3));
    await auditDomains(['a.test', 'b.test'], options());

    expect(forwarding.mutatingCalls).toEqual([]);
    expect(dns.mutatingCalls).toEqual([]);
  });
});

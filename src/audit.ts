import { FORWARD_EMAIL_MX_HOSTS, VERIFICATION_TXT_ATTRIBUTE } from './constants.js';
import { cleanDomain } from './domain.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { DnsHost, DnsZone, ForwardingDomain, ForwardingProvider } from './provider.js';
import { recordIdentity, unquoteTxt } from './records.js';
import type { AuditChecks, AuditClassification, AuditResult } from './types.js';

export interface AuditOptions {
  forwarding: ForwardingProvider;
  dns: DnsHost;
  /** Aliases a fully configured domain must have */
  aliasCount: number;
}

/** Lookup outcome: found, confirmed absent, or unknown because the call failed */
type Lookup<T> = { kind: 'found'; value: T } | { kind: 'absent' } | { kind: 'error' };

const VERIFICATION_IDENTITY = recordIdentity('TXT', `${VERIFICATION_TXT_ATTRIBUTE}=`);

/**
 * `FullyConfigured` when every check passes, `NotConfigured` when both the
 * provider and the DNS host confirm the domain is unknown to them,
 * `PartiallyConfigured` otherwise.
 */
export function classify(
  checks: AuditChecks,
  absent: { provider: boolean; zone: boolean }
): AuditClassification {
  if (Object.values(checks).every(Boolean)) return 'FullyConfigured';
  if (absent.provider && absent.zone) return 'NotConfigured';
  return 'PartiallyConfigured';
}

/**
 * Check a domain's real state at the forwarding provider and the DNS host.
 *
 * Read-only, and independent of the provisioning state file. Lookup errors
 * are reported as failed checks with an issue; this never throws.
 */
export async function auditDomain(input: string, options: AuditOptions): Promise<AuditResult> {
  const domain = cleanDomain(input);
  const issues: string[] = [];
  const checks: AuditChecks = {
    providerDomain: false,
    providerVerified: false,
    aliasCount: false,
    dnsZone: false,
    txtRecord: false,
    mxRecords: false,
  };
  let aliasCount = 0;

  const provider = await lookup(() => options.forwarding.findDomain(domain), 'Provider', issues);
  if (provider.kind === 'found') {
    checks.providerDomain = true;
    checks.providerVerified = checkProviderStatus(provider.value, issues);
    aliasCount = await countAliases(provider.value.id, options, issues);
    checks.aliasCount = aliasCount >= options.aliasCount;
  } else if (provider.kind === 'absent') {
    issues.push('Domain not found at forwarding provider');
  }

  const zone = await lookup(() => options.dns.findZone(domain), 'DNS zone', issues);
  if (zone.kind === 'found') {
    checks.dnsZone = true;
    const token = provider.kind === 'found' ? provider.value.verificationToken : undefined;
    checks.txtRecord = await checkTxt(domain, zone.value, token, options, issues);
    checks.mxRecords = await checkMx(domain, zone.value, options, issues);
  } else if (zone.kind === 'absent') {
    issues.push('DNS zone not found at DNS host');
  }

  const classification = classify(checks, {
    provider: provider.kind === 'absent',
    zone: zone.kind === 'absent',
  });

  logger.debug('audit_domain', { domain, classification, issues: issues.length });
  return { domain, classification, checks, aliasCount, issues };
}

/** Audit domains one after another, in input order. */
export async function auditDomains(
  domains: string[],
  options: AuditOptions
): Promise<AuditResult[]> {
  const results: AuditResult[] = [];
  for (const domain of domains) {
    results.push(await auditDomain(domain, options));
  }
  return results;
}

async function lookup<T>(
  fn: () => Promise<T | null>,
  label: string,
  issues: string[]
): Promise<Lookup<T>> {
  try {
    const value = await fn();
    return value === null ? { kind: 'absent' } : { kind: 'found', value };
  } catch (err) {
    issues.push(`${label} lookup failed: ${errorMessage(err)}`);
    return { kind: 'error' };
  }
}

function checkProviderStatus(domain: ForwardingDomain, issues: string[]): boolean {
  if (!domain.hasMxRecord) issues.push('Provider has not detected the MX record');
  if (!domain.hasTxtRecord) issues.push('Provider has not detected the TXT record');
  return domain.hasMxRecord && domain.hasTxtRecord;
}

async function countAliases(
  providerId: string,
  options: AuditOptions,
  issues: string[]
): Promise<number> {
  try {
    const aliases = await options.forwarding.listAliases(providerId);
    if (aliases.length < options.aliasCount) {
      issues.push(`Only ${aliases.length} of ${options.aliasCount} aliases present`);
    }
    return aliases.length;
  } catch (err) {
    issues.push(`Alias lookup failed: ${errorMessage(err)}`);
    return 0;
  }
}

async function checkTxt(
  domain: string,
  zone: DnsZone,
  token: string | undefined,
  options: AuditOptions,
  issues: string[]
): Promise<boolean> {
  try {
    const records = await options.dns.getRecords(zone.name, domain, 'TXT');
    const verification = records.filter(
      (r) => recordIdentity(r.type, r.value) === VERIFICATION_IDENTITY
    );
    if (verification.length === 0) {
      issues.push('TXT verification record missing');
      return false;
    }
    if (token) {
      const expected = `${VERIFICATION_TXT_ATTRIBUTE}=${token}`;
      if (!verification.some((r) => unquoteTxt(r.value) === expected)) {
        issues.push('TXT verification record does not match provider token');
        return false;
      }
    }
    return true;
  } catch (err) {
    issues.push(`TXT record lookup failed: ${errorMessage(err)}`);
    return false;
  }
}

async function checkMx(
  domain: string,
  zone: DnsZone,
  options: AuditOptions,
  issues: string[]
): Promise<boolean> {
  try {
    const records = await options.dns.getRecords(zone.name, domain, 'MX');
    const hosts = new Set(records.map((r) => r.value.trim().toLowerCase().replace(/\.$/, '')));
    const missing = FORWARD_EMAIL_MX_HOSTS.filter((host) => !hosts.has(host));
    for (const host of missing) {
      issues.push(`MX record missing: ${host}`);
    }
    return missing.length === 0;
  } catch (err) {
    issues.push(`MX record lookup failed: ${errorMessage(err)}`);
    return false;
  }
}

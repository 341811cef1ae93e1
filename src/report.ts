import type { AuditResult } from './types.js';

const CSV_COLUMNS = [
  'domain',
  'classification',
  'provider_domain',
  'provider_verified',
  'alias_count',
  'dns_zone',
  'txt_record',
  'mx_records',
  'issues',
] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function passFail(ok: boolean): string {
  return ok ? 'pass' : 'fail';
}

/** One row per domain; `alias_count` holds the number found. */
export function toCsvReport(results: AuditResult[]): string {
  const rows = results.map((r) =>
    [
      r.domain,
      r.classification,
      passFail(r.checks.providerDomain),
      passFail(r.checks.providerVerified),
      String(r.aliasCount),
      passFail(r.checks.dnsZone),
      passFail(r.checks.txtRecord),
      passFail(r.checks.mxRecords),
      r.issues.join('; '),
    ]
      .map(csvField)
      .join(',')
  );
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}

export function toJsonReport(results: AuditResult[], generatedAt = new Date()): string {
  const totals = {
    FullyConfigured: 0,
    PartiallyConfigured: 0,
    NotConfigured: 0,
  };
  for (const r of results) totals[r.classification]++;

  return (
    JSON.stringify({ generatedAt: generatedAt.toISOString(), totals, domains: results }, null, 2) +
    '\n'
  );
}

/** Pick the format from the file extension: `.csv` or JSON. */
export function renderReport(filePath: string, results: AuditResult[]): string {
  return filePath.toLowerCase().endsWith('.csv') ? toCsvReport(results) : toJsonReport(results);
}

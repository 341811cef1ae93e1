import {
  CATCH_ALL_TXT_ATTRIBUTE,
  FORWARD_EMAIL_MX_HOSTS,
  FORWARD_EMAIL_MX_PRIORITY,
  VERIFICATION_TXT_ATTRIBUTE,
} from './constants.js';
import { cleanDomain } from './domain.js';
import type { DnsRecordInput } from './types.js';

export type RecordPurpose = 'verification' | 'catch-all' | 'mx';

/** A DNS record required for forwarding, with what it is for */
export interface RequiredDnsRecord extends DnsRecordInput {
  purpose: RecordPurpose;
}

/**
 * Get the four apex records a domain needs for forwarding: the verification
 * TXT, the catch-all TXT and one MX per mail exchanger. All are DNS-only.
 *
 * Pure function, no I/O.
 */
export function getForwardingRecords(
  input: string,
  verificationToken: string,
  destination: string
): RequiredDnsRecord[] {
  const domain = cleanDomain(input);

  return [
    {
      type: 'TXT',
      name: domain,
      value: quoteTxt(`${VERIFICATION_TXT_ATTRIBUTE}=${verificationToken}`),
      proxied: false,
      purpose: 'verification',
    },
    {
      type: 'TXT',
      name: domain,
      value: quoteTxt(`${CATCH_ALL_TXT_ATTRIBUTE}=${destination}`),
      proxied: false,
      purpose: 'catch-all',
    },
    ...FORWARD_EMAIL_MX_HOSTS.map(
      (host): RequiredDnsRecord => ({
        type: 'MX',
        name: domain,
        value: host,
        priority: FORWARD_EMAIL_MX_PRIORITY,
        proxied: false,
        purpose: 'mx',
      })
    ),
  ];
}

/** Human-readable label used in error messages, e.g. `MX mx2.forwardemail.net` */
export function describeRecord(record: RequiredDnsRecord): string {
  return record.purpose === 'mx'
    ? `MX ${record.value}`
    : `TXT ${record.purpose}`;
}

export function quoteTxt(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

export function unquoteTxt(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\"/g, '"');
  }
  return trimmed;
}

/**
 * Key that distinguishes records sharing a (type, name): the TXT attribute
 * before `=`, or the MX exchanger host. Two records with the same key are
 * the same logical record and an upsert replaces one with the other.
 */
export function recordIdentity(type: string, value: string): string {
  const upper = type.toUpperCase();
  // TXT: attribute name, e.g. `forward-email` in `forward-email=<dest>`
  if (upper === 'TXT') {
    const text = unquoteTxt(value);
    const eq = text.indexOf('=');
    return `TXT:${(eq === -1 ? text : text.slice(0, eq)).toLowerCase()}`;
  }
  // MX: exchanger host, without case or trailing dot
  if (upper === 'MX') {
    return `MX:${value.trim().toLowerCase().replace(/\.$/, '')}`;
  }
  // Anything else: one record per (type, name)
  return upper;
}

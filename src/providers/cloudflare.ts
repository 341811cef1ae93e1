import { cleanDomain } from '../domain.js';
import { ProviderError, isTransientStatus, networkError } from '../errors.js';
import type { DnsHost, DnsZone, HostedRecord, UpsertOutcome } from '../provider.js';
import { recordIdentity, unquoteTxt } from '../records.js';
import type { DnsRecordInput } from '../types.js';

export interface CloudflareOptions {
  apiToken: string;
  /** Per-request timeout (default 30s) */
  timeoutMs?: number;
}

interface CloudflareApiResponse<T> {
  success: boolean;
  errors: { code: number; message: string }[];
  result: T;
}

interface CloudflareDnsRecord {
  id: string;
  type: string;
  name: string;
  content: string;
  priority?: number;
  proxied?: boolean;
}

const CF_API = 'https://api.cloudflare.com/client/v4';
const DEFAULT_TIMEOUT_MS = 30_000;

async function cfFetchWithToken<T>(
  apiToken: string,
  path: string,
  init: RequestInit | undefined,
  timeoutMs: number
): Promise<CloudflareApiResponse<T>> {
  const headers = new Headers(init?.headers);
  headers.set('Authorization', `Bearer ${apiToken}`);
  headers.set('Content-Type', 'application/json');

  let res: Response;
  try {
    res = await fetch(`${CF_API}${path}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw networkError('dns', err);
  }

  if (!res.ok) {
    const text = await res.text();
    throw new ProviderError(`Cloudflare API error ${res.status}: ${text}`, {
      service: 'dns',
      status: res.status,
      transient: isTransientStatus(res.status),
    });
  }

  const data = (await res.json()) as CloudflareApiResponse<T>;

  if (!data.success) {
    const errorDetails =
      data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') ||
      'unknown error';
    throw new ProviderError(`Cloudflare API error: ${errorDetails}`, {
      service: 'dns',
      transient: false,
    });
  }

  return data;
}

function toHostedRecord(r: CloudflareDnsRecord): HostedRecord {
  return {
    id: r.id,
    type: r.type,
    name: r.name,
    value: r.content,
    priority: r.priority,
    proxied: r.proxied,
  };
}

function sameContent(type: string, a: string, b: string): boolean {
  if (type.toUpperCase() === 'TXT') return unquoteTxt(a) === unquoteTxt(b);
  return a.trim().toLowerCase().replace(/\.$/, '') === b.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Create a Cloudflare DNS host adapter.
 *
 * Uses Cloudflare API v4 with native `fetch`. Zone IDs are looked up by name
 * and cached for the lifetime of the adapter. Records are written DNS-only
 * with automatic TTL.
 */
export function cloudflare(options: CloudflareOptions): DnsHost {
  const { apiToken } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const zoneLookups = new Map<string, Promise<DnsZone | null>>();

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }

  function cfFetch<T>(path: string, init?: RequestInit) {
    return cfFetchWithToken<T>(apiToken, path, init, timeoutMs);
  }

  async function lookupZone(zone: string): Promise<DnsZone | null> {
    const data = await cfFetch<{ id: string; name: string }[]>(
      `/zones?name=${encodeURIComponent(zone)}`
    );
    const match = data.result[0];
    return match ? { id: match.id, name: match.name } : null;
  }

  function findZone(input: string): Promise<DnsZone | null> {
    const zone = cleanDomain(input);
    let pending = zoneLookups.get(zone);
    if (!pending) {
      pending = lookupZone(zone).catch((err: unknown) => {
        zoneLookups.delete(zone);
        throw err;
      });
      zoneLookups.set(zone, pending);
    }
    return pending;
  }

  async function requireZoneId(zone: string): Promise<string> {
    const found = await findZone(zone);
    if (!found) {
      throw new ProviderError(`Cloudflare: no zone found for domain "${cleanDomain(zone)}"`, {
        service: 'dns',
        transient: false,
        code: 'zone_not_found',
      });
    }
    return found.id;
  }

  async function getRecords(zone: string, name: string, type?: string): Promise<HostedRecord[]> {
    const zoneId = await requireZoneId(zone);
    const query = new URLSearchParams({ name });
    if (type) query.set('type', type);
    const data = await cfFetch<CloudflareDnsRecord[]>(
      `/zones/${zoneId}/dns_records?${query.toString()}`
    );
    return data.result.map(toHostedRecord);
  }

  return {
    findZone,
    getRecords,

    async upsertRecord(zone: string, record: DnsRecordInput): Promise<UpsertOutcome> {
      const zoneId = await requireZoneId(zone);
      const proxied = record.proxied ?? false;
      const identity = recordIdentity(record.type, record.value);

      const existing = await getRecords(zone, record.name, record.type);
      const match = existing.find((r) => recordIdentity(r.type, r.value) === identity);

      if (
        match &&
        sameContent(record.type, match.value, record.value) &&
        (match.proxied ?? false) === proxied &&
        (record.priority === undefined || match.priority === record.priority)
      ) {
        return 'unchanged';
      }

      const body = JSON.stringify({
        type: record.type,
        name: record.name,
        content: record.value,
        ttl: 1,
        proxied,
        ...(record.priority !== undefined ? { priority: record.priority } : {}),
      });

      if (match) {
        await cfFetch(`/zones/${zoneId}/dns_records/${match.id}`, { method: 'PUT', body });
        return 'updated';
      }

      await cfFetch(`/zones/${zoneId}/dns_records`, { method: 'POST', body });
      return 'created';
    },
  };
}

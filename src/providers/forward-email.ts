import { cleanDomain } from '../domain.js';
import { ProviderError, isTransientStatus, networkError } from '../errors.js';
import type {
  CreateAliasOutcome,
  DomainStatus,
  ForwardingDomain,
  ForwardingProvider,
} from '../provider.js';

export interface ForwardEmailOptions {
  apiKey: string;
  /** Plan requested by `enableProtection` (default `enhanced_protection`) */
  protectionPlan?: string;
  /** Per-request timeout (default 30s) */
  timeoutMs?: number;
}

interface ForwardEmailDomain {
  id: string;
  name: string;
  has_mx_record?: boolean;
  has_txt_record?: boolean;
  verification_record?: string;
  plan?: string;
}

interface ForwardEmailAlias {
  id: string;
  name: string;
}

interface ForwardEmailResult<T> {
  data: T;
  /** From `X-Page-Count`, when the endpoint is paginated */
  pageCount?: number;
}

const FE_API = 'https://api.forwardemail.net/v1';
const DEFAULT_TIMEOUT_MS = 30_000;
const ALIAS_PAGE_SIZE = 50;

function errorCode(status: number, message: string): string | undefined {
  if (status === 409 || /already exists?/i.test(message)) return 'already_exists';
  if (status === 404) return 'not_found';
  if (status === 402) return 'plan_unsupported';
  return undefined;
}

async function readErrorMessage(res: Response): Promise<string> {
  const text = await res.text();
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return text;
}

async function feFetchWithKey<T>(
  apiKey: string,
  path: string,
  init: RequestInit | undefined,
  timeoutMs: number
): Promise<ForwardEmailResult<T>> {
  const headers = new Headers(init?.headers);
  headers.set('Authorization', `Basic ${Buffer.from(`${apiKey}:`).toString('base64')}`);
  headers.set('Content-Type', 'application/json');
  headers.set('Accept', 'application/json');

  let res: Response;
  try {
    res = await fetch(`${FE_API}${path}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw networkError('forwarding', err);
  }

  if (!res.ok) {
    const message = await readErrorMessage(res);
    throw new ProviderError(`Forward Email API error ${res.status}: ${message}`, {
      service: 'forwarding',
      status: res.status,
      transient: isTransientStatus(res.status),
      code: errorCode(res.status, message),
    });
  }

  const data = (await res.json()) as T;
  const pageCount = Number(res.headers.get('X-Page-Count'));
  return { data, pageCount: Number.isFinite(pageCount) && pageCount > 0 ? pageCount : undefined };
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof ProviderError && err.code === code;
}

/**
 * Create a Forward Email provider adapter.
 *
 * Uses the REST API with native `fetch` and HTTP Basic auth (API key as
 * username). Status reads use the stored domain flags and never call the
 * provider's active verification endpoint.
 */
export function forwardEmail(options: ForwardEmailOptions): ForwardingProvider {
  const { apiKey } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const protectionPlan = options.protectionPlan ?? 'enhanced_protection';

  if (!apiKey) {
    throw new Error('Forward Email: apiKey is required');
  }

  function feFetch<T>(path: string, init?: RequestInit) {
    return feFetchWithKey<T>(apiKey, path, init, timeoutMs);
  }

  async function getDomain(idOrName: string): Promise<ForwardEmailDomain> {
    const { data } = await feFetch<ForwardEmailDomain>(
      `/domains/${encodeURIComponent(idOrName)}`
    );
    return data;
  }

  return {
    async addDomain(input: string): Promise<string> {
      const domain = cleanDomain(input);
      try {
        const { data } = await feFetch<ForwardEmailDomain>('/domains', {
          method: 'POST',
          body: JSON.stringify({ domain }),
        });
        return data.id;
      } catch (err) {
        if (!hasCode(err, 'already_exists')) throw err;
        return (await getDomain(domain)).id;
      }
    },

    async enableProtection(providerId: string): Promise<string> {
      let updated: ForwardEmailDomain;
      try {
        const { data } = await feFetch<ForwardEmailDomain>(
          `/domains/${encodeURIComponent(providerId)}`,
          { method: 'PUT', body: JSON.stringify({ plan: protectionPlan }) }
        );
        updated = data;
      } catch (err) {
        if (err instanceof ProviderError && (err.status === 402 || err.status === 403)) {
          throw new ProviderError(`Forward Email: plan does not support ${protectionPlan}`, {
            service: 'forwarding',
            status: err.status,
            transient: false,
            code: 'plan_unsupported',
            cause: err,
          });
        }
        throw err;
      }

      const token = updated.verification_record ?? (await getDomain(providerId)).verification_record;
      if (!token) {
        throw new ProviderError('Forward Email: domain has no verification record', {
          service: 'forwarding',
          transient: false,
          code: 'no_verification_record',
        });
      }
      return token;
    },

    async getDomainStatus(providerId: string): Promise<DomainStatus> {
      const domain = await getDomain(providerId);
      return {
        hasMxRecord: domain.has_mx_record === true,
        hasTxtRecord: domain.has_txt_record === true,
      };
    },

    async findDomain(input: string): Promise<ForwardingDomain | null> {
      try {
        const domain = await getDomain(cleanDomain(input));
        return {
          id: domain.id,
          name: domain.name,
          hasMxRecord: domain.has_mx_record === true,
          hasTxtRecord: domain.has_txt_record === true,
          verificationToken: domain.verification_record,
        };
      } catch (err) {
        if (hasCode(err, 'not_found')) return null;
        throw err;
      }
    },

    async listAliases(providerId: string): Promise<string[]> {
      const names: string[] = [];
      let page = 1;

      while (true) {
        const { data, pageCount } = await feFetch<ForwardEmailAlias[]>(
          `/domains/${encodeURIComponent(providerId)}/aliases?page=${page}&limit=${ALIAS_PAGE_SIZE}`
        );
        for (const alias of data) {
          names.push(alias.name.toLowerCase());
        }
        if (!pageCount || page >= pageCount) break;
        page++;
      }

      return names;
    },

    async createAlias(
      providerId: string,
      localPart: string,
      destination: string
    ): Promise<CreateAliasOutcome> {
      try {
        await feFetch<ForwardEmailAlias>(
          `/domains/${encodeURIComponent(providerId)}/aliases`,
          {
            method: 'POST',
            body: JSON.stringify({ name: localPart, recipients: [destination], is_enabled: true }),
          }
        );
        return 'created';
      } catch (err) {
        if (hasCode(err, 'already_exists')) return 'exists';
        throw err;
      }
    },
  };
}

import type { DnsRecordInput } from './types.js';

/** Status flags the forwarding provider has observed for a domain */
export interface DomainStatus {
  hasMxRecord: boolean;
  hasTxtRecord: boolean;
}

/** A domain as seen by the forwarding provider */
export interface ForwardingDomain extends DomainStatus {
  id: string;
  name: string;
  /** Verification token, when the provider exposes one */
  verificationToken?: string;
}

export type CreateAliasOutcome = 'created' | 'exists';

/**
 * Forwarding provider adapter. Mutating calls are `addDomain`,
 * `enableProtection` and `createAlias`; the rest are pure reads.
 */
export interface ForwardingProvider {
  /** Register a domain; returns the existing id if already registered */
  addDomain(name: string): Promise<string>;
  /**
   * Turn on ownership protection and return the verification token.
   * Throws a permanent ProviderError (code `plan_unsupported`) when the
   * account plan does not allow it.
   */
  enableProtection(providerId: string): Promise<string>;
  /** Read the provider's last observed DNS status, without triggering a re-check */
  getDomainStatus(providerId: string): Promise<DomainStatus>;
  /** Look a domain up by name; `null` if the provider does not know it */
  findDomain(name: string): Promise<ForwardingDomain | null>;
  /** Local-parts of the aliases currently defined on the domain */
  listAliases(providerId: string): Promise<string[]>;
  createAlias(
    providerId: string,
    localPart: string,
    destination: string
  ): Promise<CreateAliasOutcome>;
}

export interface DnsZone {
  id: string;
  name: string;
}

/** A DNS record returned by the host, including its host-specific ID */
export interface HostedRecord {
  id: string;
  type: string;
  name: string;
  value: string;
  priority?: number;
  proxied?: boolean;
}

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

/** DNS host adapter */
export interface DnsHost {
  /** `null` if the host has no zone with this name */
  findZone(zone: string): Promise<DnsZone | null>;
  /** Records at `name` in `zone`, optionally of a single type */
  getRecords(zone: string, name: string, type?: string): Promise<HostedRecord[]>;
  /** Create or update a record, always DNS-only unless `proxied` is set */
  upsertRecord(zone: string, record: DnsRecordInput): Promise<UpsertOutcome>;
}

/** Forward stages of a domain, in order */
export type Stage =
  | 'Pending'
  | 'ProviderRegistered'
  | 'DnsConfigured'
  | 'Verified'
  | 'AliasesCreated'
  | 'Completed';

/** Unit of work that moves a domain from one stage to the next */
export type Phase = 'registration' | 'dns' | 'verification' | 'aliases';

/** Current lifecycle position of a domain */
export type DomainState =
  | { status: Stage }
  | { status: 'Failed'; phase: Phase };

/** Entry in a domain's append-only error history */
export interface DomainError {
  timestamp: string;
  phase: Phase;
  message: string;
}

/** Everything known about one domain, persisted in the state file */
export interface DomainRecord {
  /** Cleaned domain name, unique across the store */
  name: string;
  state: DomainState;
  /** Forwarding provider's id for the domain; empty until registered */
  providerId: string;
  /** Token published in the verification TXT record */
  verificationToken: string;
  /** Last MX status reported by the provider */
  hasMxRecord: boolean;
  /** Last TXT status reported by the provider */
  hasTxtRecord: boolean;
  /** Local-parts created at the provider, in creation order */
  aliases: string[];
  errors: DomainError[];
  attemptCounts: Partial<Record<Phase, number>>;
}

export interface AliasRecord {
  localPart: string;
  domain: string;
}

/** Line of the failure log artifact */
export interface FailureLogEntry {
  domain: string;
  phase: Phase;
  message: string;
  timestamp: string;
}

/** A DNS record the pipeline wants to exist */
export interface DnsRecordInput {
  type: 'TXT' | 'MX';
  /** Fully-qualified record name (the zone apex for all forwarding records) */
  name: string;
  value: string;
  priority?: number;
  proxied?: boolean;
}

export type AuditClassification =
  | 'FullyConfigured'
  | 'PartiallyConfigured'
  | 'NotConfigured';

export interface AuditChecks {
  /** Domain exists at the forwarding provider */
  providerDomain: boolean;
  /** Provider reports both MX and TXT as detected */
  providerVerified: boolean;
  /** At least the configured number of aliases exists */
  aliasCount: boolean;
  /** Zone exists at the DNS host */
  dnsZone: boolean;
  /** Verification TXT record present */
  txtRecord: boolean;
  /** Both MX records present */
  mxRecords: boolean;
}

export interface AuditResult {
  domain: string;
  classification: AuditClassification;
  checks: AuditChecks;
  /** Number of aliases found at the provider (0 when the domain is absent) */
  aliasCount: number;
  issues: string[];
}

import { logger } from '../logger.js';
import type {
  DnsHost,
  DomainStatus,
  ForwardingDomain,
  ForwardingProvider,
  HostedRecord,
  UpsertOutcome,
} from '../provider.js';
import type { DnsRecordInput } from '../types.js';

const DRY_RUN_PREFIX = 'dry-run:';

export function isDryRunId(providerId: string): boolean {
  return providerId.startsWith(DRY_RUN_PREFIX);
}

/**
 * Forwarding provider that never mutates anything. Reads go to `inner` when
 * given; domains "added" during the dry run get synthetic ids that report
 * both records present and no aliases.
 */
export function dryRunForwarding(inner?: ForwardingProvider): ForwardingProvider {
  return {
    async addDomain(name: string): Promise<string> {
      const existing = inner ? await inner.findDomain(name) : null;
      const id = existing?.id ?? `${DRY_RUN_PREFIX}${name}`;
      logger.info('dry_run_add_domain', { domain: name, providerId: id });
      return id;
    },

    async enableProtection(providerId: string): Promise<string> {
      logger.info('dry_run_enable_protection', { providerId });
      return `${DRY_RUN_PREFIX}token`;
    },

    async getDomainStatus(providerId: string): Promise<DomainStatus> {
      if (isDryRunId(providerId) || !inner) {
        return { hasMxRecord: true, hasTxtRecord: true };
      }
      return inner.getDomainStatus(providerId);
    },

    async findDomain(name: string): Promise<ForwardingDomain | null> {
      return inner ? inner.findDomain(name) : null;
    },

    async listAliases(providerId: string): Promise<string[]> {
      if (isDryRunId(providerId) || !inner) return [];
      return inner.listAliases(providerId);
    },

    async createAlias(providerId: string, localPart: string) {
      logger.debug('dry_run_create_alias', { providerId, localPart });
      return 'created' as const;
    },
  };
}

/** DNS host that reports what it would write instead of writing it. */
export function dryRunDnsHost(inner?: DnsHost): DnsHost {
  return {
    async findZone(zone: string) {
      return inner ? inner.findZone(zone) : { id: `${DRY_RUN_PREFIX}${zone}`, name: zone };
    },

    async getRecords(zone: string, name: string, type?: string): Promise<HostedRecord[]> {
      return inner ? inner.getRecords(zone, name, type) : [];
    },

    async upsertRecord(zone: string, record: DnsRecordInput): Promise<UpsertOutcome> {
      logger.info('dry_run_upsert_record', {
        zone,
        type: record.type,
        name: record.name,
        value: record.value,
      });
      return 'unchanged';
    },
  };
}

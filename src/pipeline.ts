import { generateAliases, isRoleAlias } from './alias-generator.js';
import { loadAliasExport, writeAliasExport } from './alias-export.js';
import type { Config } from './config.js';
import { ROLE_ALIASES } from './constants.js';
import { uniqueDomains } from './domain.js';
import { ProviderError, errorMessage, isTransient } from './errors.js';
import { appendFailure } from './failure-log.js';
import {
  PHASE_TARGET,
  createDomainRecord,
  describeState,
  nextStep,
  transition,
} from './lifecycle.js';
import { logger } from './logger.js';
import type { NamePools } from './name-pools.js';
import type { DnsHost, ForwardingProvider } from './provider.js';
import { describeRecord, getForwardingRecords } from './records.js';
import { type RetryPolicy, type Sleep, attemptWithPolicy, defaultSleep } from './retry.js';
import type { StateStore } from './state-store.js';
import type { AliasRecord, DomainRecord, Phase, Stage } from './types.js';

export interface PipelineSettings {
  /** Aliases per domain, role aliases included */
  aliasCount: number;
  /** Share of generated aliases in the `first` format */
  firstNameOnlyRatio: number;
  /** Batch-wide pause between the DNS and verification passes */
  propagationWaitMs: number;
  /** Retries for single API requests during registration and DNS */
  requests: RetryPolicy;
  verification: RetryPolicy;
  aliases: RetryPolicy;
}

export interface PipelineOptions {
  forwarding: ForwardingProvider;
  dns: DnsHost;
  store: StateStore;
  /** Mailbox every alias and the catch-all forward to */
  destination: string;
  pools: NamePools;
  settings: PipelineSettings;
  /** Alias export to seed uniqueness from and to regenerate */
  aliasesFile?: string;
  /** Write the regenerated export (off for dry runs) */
  writeExport?: boolean;
  /** Failure log to append to; omitted means no failure log */
  failureLogFile?: string;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export interface DomainSummary {
  domain: string;
  state: string;
  aliasCount: number;
}

export interface PipelineSummary {
  domains: DomainSummary[];
  completed: number;
  failed: number;
  /** Domains left in a resumable intermediate stage */
  inProgress: number;
  exportedAliases: number;
  hasFailures: boolean;
}

/** Thrown inside the verification poll while the provider has not seen a record yet */
class RecordsNotDetectedError extends Error {
  constructor(readonly missing: string[]) {
    super(`Provider has not detected: ${missing.join(', ')}`);
    this.name = 'RecordsNotDetectedError';
  }
}

/** Provider refusals that fall back to using the provider id as token */
const PROTECTION_FALLBACK_CODES = new Set(['plan_unsupported', 'no_verification_record']);

/**
 * Settings for a run. Dry runs publish nothing, so they skip the propagation
 * wait and poll without delay.
 */
export function pipelineSettingsFromConfig(config: Config): PipelineSettings {
  const waits = !config.dryRun;
  return {
    aliasCount: config.aliasCount,
    firstNameOnlyRatio: config.firstNameOnlyPercent / 100,
    propagationWaitMs: waits ? config.dnsPropagationWaitSeconds * 1000 : 0,
    requests: { maxAttempts: 3, delayStrategy: 'exponential', baseDelayMs: 2000 },
    verification: {
      maxAttempts: config.verificationMaxAttempts,
      delayStrategy: 'fixed',
      baseDelayMs: waits ? config.verificationRetryDelaySeconds * 1000 : 0,
    },
    aliases: {
      maxAttempts: config.aliasMaxRetries,
      delayStrategy: 'exponential',
      baseDelayMs: config.aliasInitialBackoffSeconds * 1000,
    },
  };
}

/**
 * Drives every domain through registration, DNS, verification and alias
 * creation. Each pass runs over the whole batch before the next one starts,
 * and each domain only runs the phases its persisted state still needs.
 * One domain failing never stops the others.
 */
export class ProvisioningPipeline {
  private readonly forwarding: ForwardingProvider;
  private readonly dns: DnsHost;
  private readonly store: StateStore;
  private readonly settings: PipelineSettings;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineOptions) {
    this.forwarding = options.forwarding;
    this.dns = options.dns;
    this.store = options.store;
    this.settings = options.settings;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  /** Provision `domains`; names are cleaned and repeats run once. */
  async run(domains: string[]): Promise<PipelineSummary> {
    const records = uniqueDomains(domains).map((name) => {
      const existing = this.store.get(name);
      if (existing) return existing;
      const record = createDomainRecord(name);
      this.store.upsert(record);
      return record;
    });
    await this.store.save();

    logger.info('pipeline_started', {
      domains: records.length,
      pending: records.filter((r) => nextStep(r.state) !== null).length,
    });

    for (const record of this.due(records, 'registration')) {
      await this.register(record);
    }

    let configured = 0;
    for (const record of this.due(records, 'dns')) {
      if (await this.configureDns(record)) configured++;
    }

    if (configured > 0 && this.settings.propagationWaitMs > 0) {
      logger.info('pipeline_propagation_wait', {
        seconds: this.settings.propagationWaitMs / 1000,
        domains: configured,
      });
      await this.sleep(this.settings.propagationWaitMs);
    }

    for (const record of this.due(records, 'verification')) {
      await this.verify(record);
    }

    const exported = this.options.aliasesFile
      ? await loadAliasExport(this.options.aliasesFile)
      : [];
    const used = this.usedLocalParts(exported);

    for (const record of records) {
      if (nextStep(record.state) === 'aliases') {
        await this.createAliases(record, used);
      }
      if (nextStep(record.state) === 'completion') {
        await this.complete(record);
      }
    }

    const exportedAliases = await this.writeExport(exported);
    await this.store.save();

    const summary = this.summarize(records, exportedAliases);
    logger.info('pipeline_finished', {
      completed: summary.completed,
      failed: summary.failed,
      inProgress: summary.inProgress,
      exportedAliases,
    });
    return summary;
  }

  private due(records: DomainRecord[], phase: Phase): DomainRecord[] {
    return records.filter((r) => nextStep(r.state) === phase);
  }

  private async register(record: DomainRecord): Promise<void> {
    this.countAttempt(record, 'registration');

    let providerId: string;
    let token: string;
    try {
      providerId = await this.request(() => this.forwarding.addDomain(record.name));
      token = await this.protectionToken(record, providerId);
    } catch (err) {
      await this.fail(record, 'registration', errorMessage(err));
      return;
    }

    record.providerId = providerId;
    record.verificationToken = token;
    await this.advance(record, PHASE_TARGET.registration);
  }

  private async protectionToken(record: DomainRecord, providerId: string): Promise<string> {
    try {
      return await this.request(() => this.forwarding.enableProtection(providerId));
    } catch (err) {
      if (err instanceof ProviderError && err.code && PROTECTION_FALLBACK_CODES.has(err.code)) {
        logger.warn('pipeline_protection_unavailable', {
          domain: record.name,
          reason: err.message,
        });
        return providerId;
      }
      throw err;
    }
  }

  private async configureDns(record: DomainRecord): Promise<boolean> {
    this.countAttempt(record, 'dns');

    const required = getForwardingRecords(
      record.name,
      record.verificationToken,
      this.options.destination
    );
    const missing: string[] = [];
    const reasons: string[] = [];

    for (const dnsRecord of required) {
      try {
        const outcome = await this.request(() => this.dns.upsertRecord(record.name, dnsRecord));
        logger.debug('dns_record_upserted', {
          domain: record.name,
          record: describeRecord(dnsRecord),
          outcome,
        });
      } catch (err) {
        missing.push(describeRecord(dnsRecord));
        reasons.push(errorMessage(err));
      }
    }

    if (missing.length > 0) {
      const lastReason = reasons[reasons.length - 1] ?? 'unknown error';
      await this.fail(
        record,
        'dns',
        `Missing DNS records: ${missing.join(', ')} (last error: ${lastReason})`
      );
      return false;
    }

    await this.advance(record, PHASE_TARGET.dns);
    return true;
  }

  private async verify(record: DomainRecord): Promise<void> {
    const policy = this.settings.verification;
    try {
      await attemptWithPolicy(
        policy,
        async () => {
          this.countAttempt(record, 'verification');
          const status = await this.forwarding.getDomainStatus(record.providerId);
          record.hasMxRecord = status.hasMxRecord;
          record.hasTxtRecord = status.hasTxtRecord;

          const missing: string[] = [];
          if (!status.hasMxRecord) missing.push('MX record');
          if (!status.hasTxtRecord) missing.push('TXT record');
          if (missing.length > 0) throw new RecordsNotDetectedError(missing);
        },
        {
          sleep: this.sleep,
          shouldRetry: (err) => err instanceof RecordsNotDetectedError || isTransient(err),
          onRetry: (err, attempt, delayMs) =>
            logger.info('verification_retry', {
              domain: record.name,
              attempt,
              delayMs,
              reason: errorMessage(err),
            }),
        }
      );
    } catch (err) {
      const cause = err instanceof Error && err.cause instanceof RecordsNotDetectedError
        ? err.cause
        : undefined;
      const message = cause
        ? `Provider has not detected ${cause.missing.join(' and ')} after ${policy.maxAttempts} attempt(s)`
        : errorMessage(err);
      await this.fail(record, 'verification', message);
      return;
    }

    await this.advance(record, PHASE_TARGET.verification);
  }

  private async createAliases(record: DomainRecord, used: Set<string>): Promise<void> {
    const target = this.settings.aliasCount;
    const destination = this.options.destination;
    let planned: string[] | undefined;

    try {
      await attemptWithPolicy(
        this.settings.aliases,
        async () => {
          this.countAttempt(record, 'aliases');
          const remote = new Set(await this.forwarding.listAliases(record.providerId));

          const batch = planned ?? this.firstPlan(record, remote, used);
          planned = batch;

          for (const localPart of batch) {
            if (record.aliases.includes(localPart)) continue;
            if (!remote.has(localPart)) {
              const outcome = await this.forwarding.createAlias(
                record.providerId,
                localPart,
                destination
              );
              logger.debug('alias_created', { domain: record.name, localPart, outcome });
            }
            record.aliases.push(localPart);
          }
        },
        {
          sleep: this.sleep,
          shouldRetry: isTransient,
          onRetry: (err, attempt, delayMs) => {
            logger.warn('alias_batch_retry', {
              domain: record.name,
              attempt,
              delayMs,
              created: record.aliases.length,
              reason: errorMessage(err),
            });
          },
        }
      );
    } catch (err) {
      await this.fail(
        record,
        'aliases',
        `${errorMessage(err)} (${record.aliases.length} of ${target} aliases created)`
      );
      return;
    }

    logger.info('aliases_created', { domain: record.name, count: record.aliases.length });
    await this.advance(record, PHASE_TARGET.aliases);
  }

  private firstPlan(record: DomainRecord, remote: Set<string>, used: Set<string>): string[] {
    this.adoptRemoteAliases(record, remote, used);
    return this.planAliases(record, used);
  }

  /**
   * Record aliases that exist at the provider but not locally, e.g. after a
   * crash mid-batch, as long as no other domain owns the local-part.
   */
  private adoptRemoteAliases(record: DomainRecord, remote: Set<string>, used: Set<string>): void {
    for (const localPart of remote) {
      if (record.aliases.length >= this.settings.aliasCount) return;
      if (record.aliases.includes(localPart)) continue;
      if (isRoleAlias(localPart)) {
        record.aliases.push(localPart);
        continue;
      }
      if (used.has(localPart)) {
        logger.warn('alias_adopt_skipped', { domain: record.name, localPart });
        continue;
      }
      used.add(localPart);
      record.aliases.push(localPart);
    }
  }

  /** Role aliases first, then enough generated names to reach the target. */
  private planAliases(record: DomainRecord, used: Set<string>): string[] {
    const planned: string[] = ROLE_ALIASES.filter((role) => !record.aliases.includes(role));
    const missing = this.settings.aliasCount - record.aliases.length;
    const roles = planned.slice(0, Math.max(0, missing));
    const generatedCount = Math.max(0, missing - roles.length);

    return [
      ...roles,
      ...generateAliases({
        domain: record.name,
        count: generatedCount,
        ratio: this.settings.firstNameOnlyRatio,
        pools: this.options.pools,
        used,
        random: this.random,
      }),
    ];
  }

  private async complete(record: DomainRecord): Promise<void> {
    if (record.aliases.length < this.settings.aliasCount) {
      logger.warn('pipeline_completion_pending', {
        domain: record.name,
        aliases: record.aliases.length,
        target: this.settings.aliasCount,
      });
      return;
    }
    await this.advance(record, 'Completed');
  }

  /** Every non-role local-part already assigned, from the export and the store */
  private usedLocalParts(exported: AliasRecord[]): Set<string> {
    const used = new Set<string>();
    for (const alias of exported) {
      if (!isRoleAlias(alias.localPart)) used.add(alias.localPart);
    }
    for (const record of this.store.all()) {
      for (const localPart of record.aliases) {
        if (!isRoleAlias(localPart)) used.add(localPart);
      }
    }
    return used;
  }

  private async writeExport(exported: AliasRecord[]): Promise<number> {
    const { aliasesFile, writeExport = true } = this.options;
    if (!aliasesFile || !writeExport) return 0;

    const all: AliasRecord[] = [...exported];
    for (const record of this.store.all()) {
      for (const localPart of record.aliases) {
        all.push({ localPart, domain: record.name });
      }
    }
    return writeAliasExport(aliasesFile, all);
  }

  private request<T>(fn: () => Promise<T>): Promise<T> {
    return attemptWithPolicy(this.settings.requests, fn, {
      sleep: this.sleep,
      shouldRetry: isTransient,
      onRetry: (err, attempt, delayMs) =>
        logger.warn('request_retry', { attempt, delayMs, reason: errorMessage(err) }),
    });
  }

  private countAttempt(record: DomainRecord, phase: Phase): void {
    record.attemptCounts[phase] = (record.attemptCounts[phase] ?? 0) + 1;
  }

  private async advance(record: DomainRecord, stage: Stage): Promise<void> {
    transition(record, { status: stage });
    logger.info('pipeline_phase_completed', { domain: record.name, state: stage });
    this.store.upsert(record);
    await this.store.save();
  }

  private async fail(record: DomainRecord, phase: Phase, message: string): Promise<void> {
    const timestamp = this.now().toISOString();
    transition(record, { status: 'Failed', phase });
    record.errors.push({ timestamp, phase, message });

    logger.error('pipeline_phase_failed', {
      domain: record.name,
      phase,
      attempts: record.attemptCounts[phase] ?? 0,
      message,
    });

    this.store.upsert(record);
    await this.store.save();
    if (this.options.failureLogFile) {
      await appendFailure(this.options.failureLogFile, {
        domain: record.name,
        phase,
        message,
        timestamp,
      });
    }
  }

  private summarize(records: DomainRecord[], exportedAliases: number): PipelineSummary {
    const domains = records.map((r) => ({
      domain: r.name,
      state: describeState(r.state),
      aliasCount: r.aliases.length,
    }));
    const completed = records.filter((r) => r.state.status === 'Completed').length;
    const failed = records.filter((r) => r.state.status === 'Failed').length;

    return {
      domains,
      completed,
      failed,
      inProgress: records.length - completed - failed,
      exportedAliases,
      hasFailures: failed > 0,
    };
  }
}

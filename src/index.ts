export { ProvisioningPipeline, pipelineSettingsFromConfig } from './pipeline.js';
export { auditDomain, auditDomains, classify } from './audit.js';
export { generateAliases, isFirstNameOnly, isRoleAlias } from './alias-generator.js';
export { loadNamePools } from './name-pools.js';
export { StateStore } from './state-store.js';
export { appendFailure, readFailureLog } from './failure-log.js';
export {
  loadAliasExport,
  parseAliasExport,
  renderAliasExport,
  writeAliasExport,
} from './alias-export.js';
export { attemptWithPolicy, delayFor } from './retry.js';
export { canTransition, createDomainRecord, nextStep, transition } from './lifecycle.js';
export { getForwardingRecords, recordIdentity } from './records.js';
export { cleanDomain, parseDomainList, readDomainList, uniqueDomains } from './domain.js';
export { loadConfig } from './config.js';
export { toCsvReport, toJsonReport } from './report.js';
export { createAdapters } from './adapters.js';
export { cloudflare } from './providers/cloudflare.js';
export { forwardEmail } from './providers/forward-email.js';
export { dryRunDnsHost, dryRunForwarding } from './providers/dry-run.js';
export {
  ProviderError,
  IllegalTransitionError,
  RetryExhaustedError,
  StateStoreError,
  ConfigError,
  AliasGenerationError,
} from './errors.js';
export {
  FORWARD_EMAIL_MX_HOSTS,
  FORWARD_EMAIL_MX_PRIORITY,
  ROLE_ALIASES,
} from './constants.js';
export type { Config } from './config.js';
export type { PipelineOptions, PipelineSettings, PipelineSummary } from './pipeline.js';
export type { RetryPolicy, DelayStrategy } from './retry.js';
export type { NamePools } from './name-pools.js';
export type {
  DnsHost,
  DnsZone,
  DomainStatus,
  ForwardingDomain,
  ForwardingProvider,
  HostedRecord,
} from './provider.js';
export type {
  AliasRecord,
  AuditChecks,
  AuditClassification,
  AuditResult,
  DomainError,
  DomainRecord,
  DomainState,
  FailureLogEntry,
  Phase,
  Stage,
} from './types.js';

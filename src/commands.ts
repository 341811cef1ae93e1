import { createAdapters, type Adapters } from './adapters.js';
import { auditDomains } from './audit.js';
import { type Config, assertLiveReady } from './config.js';
import { readDomainList } from './domain.js';
import { logger } from './logger.js';
import { loadNamePools } from './name-pools.js';
import { ProvisioningPipeline, pipelineSettingsFromConfig } from './pipeline.js';
import { renderReport } from './report.js';
import { StateStore, writeFileAtomic } from './state-store.js';

/** Where command output goes; tests capture it */
export type Print = (line: string) => void;

const stdout: Print = (line) => process.stdout.write(line + '\n');

/** Destination used when a dry run has no FORWARD_TO */
const DRY_RUN_DESTINATION = 'postmaster@example.invalid';

/**
 * Run the provisioning pipeline over the configured domains file.
 * Returns the process exit code: 1 if any domain ended failed.
 */
export async function runProvision(
  config: Config,
  print: Print = stdout,
  adapters?: Adapters
): Promise<number> {
  assertLiveReady(config, 'provision');
  const { forwarding, dns } = adapters ?? createAdapters(config);

  const domains = await readDomainList(config.domainsFile);
  const store = new StateStore(config.stateFile, { readOnly: config.dryRun });
  await store.load();

  if (config.dryRun) {
    logger.info('dry_run_enabled', { domains: domains.length });
  }

  const pipeline = new ProvisioningPipeline({
    forwarding,
    dns,
    store,
    destination: config.forwardTo ?? DRY_RUN_DESTINATION,
    pools: loadNamePools(),
    settings: pipelineSettingsFromConfig(config),
    aliasesFile: config.aliasesFile,
    writeExport: !config.dryRun,
    failureLogFile: config.dryRun ? undefined : config.failureLogFile,
  });

  const summary = await pipeline.run(domains);

  const width = Math.max(6, ...summary.domains.map((d) => d.domain.length));
  for (const d of summary.domains) {
    print(`${d.domain.padEnd(width)}  ${d.state.padEnd(22)}  ${d.aliasCount} aliases`);
  }
  print(
    `\n${summary.completed} completed, ${summary.failed} failed, ` +
      `${summary.inProgress} in progress, ${summary.exportedAliases} aliases exported`
  );

  return summary.hasFailures ? 1 : 0;
}

/**
 * Audit every domain in the domains file against the live services.
 * Returns 1 if any domain is not fully configured.
 */
export async function runAudit(
  config: Config,
  print: Print = stdout,
  adapters?: Adapters
): Promise<number> {
  assertLiveReady(config, 'audit');
  const { forwarding, dns } = adapters ?? createAdapters(config);

  const domains = await readDomainList(config.domainsFile);
  const results = await auditDomains(domains, {
    forwarding,
    dns,
    aliasCount: config.aliasCount,
  });

  for (const r of results) {
    print(`${r.domain}: ${r.classification}`);
    for (const issue of r.issues) {
      print(`  - ${issue}`);
    }
  }

  if (config.reportFile) {
    await writeFileAtomic(config.reportFile, renderReport(config.reportFile, results));
    print(`\nReport written to ${config.reportFile}`);
  }

  return results.every((r) => r.classification === 'FullyConfigured') ? 0 : 1;
}

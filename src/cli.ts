#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runAudit, runProvision } from './commands.js';
import { loadConfig } from './config.js';
import { ConfigError, StateStoreError, errorMessage } from './errors.js';
import { LOG_LEVELS, configureLogger } from './logger.js';

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('forward-provisioner')
    .usage('$0 <command> [options]')
    .command('provision', 'Register domains, configure DNS, verify and create aliases')
    .command('audit', 'Check every domain against the forwarding provider and DNS host')
    .demandCommand(1, 'Choose a command: provision or audit')
    .option('domains', { type: 'string', describe: 'Domain list, one per line' })
    .option('state', { type: 'string', describe: 'Provisioning state file (JSON)' })
    .option('failure-log', { type: 'string', describe: 'Failure log (JSON lines)' })
    .option('aliases', { type: 'string', describe: 'Alias export, one address per line' })
    .option('report', { type: 'string', describe: 'Audit report path (.csv or .json)' })
    .option('forward-to', { type: 'string', describe: 'Mailbox aliases forward to' })
    .option('dry-run', { type: 'boolean', describe: 'Exercise the pipeline without mutating calls' })
    .option('propagation-wait', { type: 'number', describe: 'Seconds to wait for DNS propagation' })
    .option('verification-attempts', { type: 'number', describe: 'Status polls per domain' })
    .option('verification-delay', { type: 'number', describe: 'Seconds between status polls' })
    .option('alias-count', { type: 'number', describe: 'Aliases per domain, info included' })
    .option('first-name-percent', { type: 'number', describe: 'Share of first-name-only aliases' })
    .option('alias-retries', { type: 'number', describe: 'Alias batch attempts per domain' })
    .option('alias-backoff', { type: 'number', describe: 'Initial alias retry delay in seconds' })
    .option('timeout', { type: 'number', describe: 'Per-request timeout in seconds' })
    .option('log-level', { choices: LOG_LEVELS, describe: 'Minimum log level (overrides LOG_LEVEL)' })
    .strict()
    .parse();

  const config = loadConfig({
    domainsFile: argv.domains,
    stateFile: argv.state,
    failureLogFile: argv['failure-log'],
    aliasesFile: argv.aliases,
    reportFile: argv.report,
    forwardTo: argv['forward-to'],
    dryRun: argv['dry-run'],
    dnsPropagationWaitSeconds: argv['propagation-wait'],
    verificationMaxAttempts: argv['verification-attempts'],
    verificationRetryDelaySeconds: argv['verification-delay'],
    aliasCount: argv['alias-count'],
    firstNameOnlyPercent: argv['first-name-percent'],
    aliasMaxRetries: argv['alias-retries'],
    aliasInitialBackoffSeconds: argv['alias-backoff'],
    requestTimeoutSeconds: argv.timeout,
  });
  configureLogger(config, argv['log-level']);

  const command = String(argv._[0]);
  if (command === 'provision') return runProvision(config);
  if (command === 'audit') return runAudit(config);

  process.stderr.write(`Unknown command: ${command}\n`);
  return 2;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exitCode = err instanceof ConfigError || err instanceof StateStoreError ? 2 : 1;
  });

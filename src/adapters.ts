import type { Config } from './config.js';
import type { DnsHost, ForwardingProvider } from './provider.js';
import { cloudflare } from './providers/cloudflare.js';
import { dryRunDnsHost, dryRunForwarding } from './providers/dry-run.js';
import { forwardEmail } from './providers/forward-email.js';

export interface Adapters {
  forwarding: ForwardingProvider;
  dns: DnsHost;
}

/**
 * Build the service adapters for a run. Dry runs wrap whatever credentials
 * are available so reads stay real and writes become no-ops.
 */
export function createAdapters(config: Config): Adapters {
  const timeoutMs = config.requestTimeoutSeconds * 1000;
  const forwarding = config.forwardEmailApiKey
    ? forwardEmail({ apiKey: config.forwardEmailApiKey, timeoutMs })
    : undefined;
  const dns = config.cloudflareApiToken
    ? cloudflare({ apiToken: config.cloudflareApiToken, timeoutMs })
    : undefined;

  if (config.dryRun) {
    return { forwarding: dryRunForwarding(forwarding), dns: dryRunDnsHost(dns) };
  }
  if (!forwarding || !dns) {
    throw new Error('Both FORWARD_EMAIL_API_KEY and CLOUDFLARE_API_TOKEN are required');
  }
  return { forwarding, dns };
}

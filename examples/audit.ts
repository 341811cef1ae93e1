/**
 * Live check: audit one domain against Forward Email and Cloudflare.
 *
 * Usage:
 *   FORWARD_EMAIL_API_KEY=xxx CLOUDFLARE_API_TOKEN=xxx npx tsx examples/audit.ts example.com
 */

import { auditDomain, cloudflare, forwardEmail } from '../src/index.js';

const domain = process.argv[2];
const apiKey = process.env.FORWARD_EMAIL_API_KEY;
const apiToken = process.env.CLOUDFLARE_API_TOKEN;

if (!domain || !apiKey || !apiToken) {
  console.error(
    'Usage: FORWARD_EMAIL_API_KEY=xxx CLOUDFLARE_API_TOKEN=xxx npx tsx examples/audit.ts <domain>'
  );
  process.exit(1);
}

async function main(domain: string, apiKey: string, apiToken: string) {
  console.log(`\nAuditing ${domain}...`);
  const result = await auditDomain(domain, {
    forwarding: forwardEmail({ apiKey }),
    dns: cloudflare({ apiToken }),
    aliasCount: 50,
  });

  console.log(`\n${result.domain}: ${result.classification}`);
  for (const [check, ok] of Object.entries(result.checks)) {
    console.log(`  ${ok ? '✓' : '✗'} ${check}`);
  }
  console.log(`  aliases: ${result.aliasCount}`);

  if (result.issues.length > 0) {
    console.log('\nIssues:');
    for (const issue of result.issues) {
      console.log(`  - ${issue}`);
    }
  }
}

main(domain, apiKey, apiToken).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

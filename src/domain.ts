import { readFile } from 'node:fs/promises';

/**
 * Clean a domain input. Accepts email addresses, URLs, or bare domains.
 *
 * Examples:
 * - `user@example.com` → `example.com`
 * - `https://www.example.com/path` → `example.com`
 * - `EXAMPLE.COM.` → `example.com`
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Extract domain from email
  if (domain.includes('@')) {
    domain = domain.slice(domain.lastIndexOf('@') + 1);
  }

  // Extract hostname from URL
  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      // If URL parsing fails, strip protocol manually
      domain = domain.split('://')[1]?.split('/')[0] ?? domain;
    }
  }

  // Remove path, query, fragment if present (non-URL input with path)
  domain = domain.split('/')[0] ?? '';

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  // Remove www prefix
  if (domain.startsWith('www.')) {
    domain = domain.slice(4);
  }

  return domain;
}

/**
 * Clean every input and drop empties and repeats, keeping first-occurrence
 * order.
 */
export function uniqueDomains(inputs: Iterable<string>): string[] {
  const seen = new Set<string>();
  const domains: string[] = [];

  for (const input of inputs) {
    const domain = cleanDomain(input);
    if (!domain || seen.has(domain)) continue;

    seen.add(domain);
    domains.push(domain);
  }

  return domains;
}

/**
 * Parse the line-oriented domain list. Blank lines and `#` comments are
 * ignored; duplicates keep their first position.
 */
export function parseDomainList(text: string): string[] {
  const lines: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    // Strip trailing comment
    const content = line.split('#')[0] ?? '';
    // Skip blank and comment-only lines
    if (!content.trim()) continue;
    lines.push(content);
  }

  return uniqueDomains(lines);
}

/** Read and parse a domains file. */
export async function readDomainList(filePath: string): Promise<string[]> {
  const text = await readFile(filePath, 'utf8');
  return parseDomainList(text);
}

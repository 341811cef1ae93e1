import { readFile } from 'node:fs/promises';
import { isNotFound, writeFileAtomic } from './state-store.js';
import type { AliasRecord } from './types.js';

export function formatAlias(alias: AliasRecord): string {
  return `${alias.localPart}@${alias.domain}`;
}

/** Parse `localPart@domain` lines; malformed lines are skipped. */
export function parseAliasExport(text: string): AliasRecord[] {
  const aliases: AliasRecord[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim().toLowerCase();
    const at = trimmed.lastIndexOf('@');
    if (at <= 0 || at === trimmed.length - 1) continue;
    aliases.push({ localPart: trimmed.slice(0, at), domain: trimmed.slice(at + 1) });
  }
  return aliases;
}

/** Read the alias export; a missing file means no aliases yet. */
export async function loadAliasExport(filePath: string): Promise<AliasRecord[]> {
  try {
    return parseAliasExport(await readFile(filePath, 'utf8'));
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

/** Sorted, de-duplicated export body */
export function renderAliasExport(aliases: Iterable<AliasRecord>): string {
  const lines = [...new Set([...aliases].map(formatAlias))].sort();
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

export async function writeAliasExport(
  filePath: string,
  aliases: Iterable<AliasRecord>
): Promise<number> {
  const body = renderAliasExport(aliases);
  await writeFileAtomic(filePath, body);
  return body ? body.trimEnd().split('\n').length : 0;
}

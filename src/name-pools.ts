import { readFileSync } from 'node:fs';
import { z } from 'zod';

export interface NamePools {
  firstNames: readonly string[];
  lastNames: readonly string[];
}

const poolSchema = z.array(z.string().regex(/^[a-z]+$/)).min(1);

function readPool(file: string): string[] {
  const url = new URL(`../data/${file}`, import.meta.url);
  const parsed = poolSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
  return [...new Set(parsed)];
}

let cached: NamePools | undefined;

/** First and last name pools shipped in `data/`, loaded once. */
export function loadNamePools(): NamePools {
  if (!cached) {
    const firstNames = readPool('first-names.json');
    const lastNames = readPool('last-names.json');
    const overlap = firstNames.filter((n) => lastNames.includes(n));
    if (overlap.length > 0) {
      throw new Error(`Name pools must be disjoint, shared: ${overlap.join(', ')}`);
    }
    cached = { firstNames, lastNames };
  }
  return cached;
}

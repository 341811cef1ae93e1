import { DEFAULT_FIRST_NAME_ONLY_RATIO, ROLE_ALIASES } from './constants.js';
import { AliasGenerationError } from './errors.js';
import type { NamePools } from './name-pools.js';

export interface GenerateAliasesOptions {
  domain: string;
  /** Number of new local-parts to produce */
  count: number;
  /** Probability of the `first` format over `first.last` */
  ratio?: number;
  pools: NamePools;
  /**
   * Local-parts already taken anywhere in the run. Every accepted candidate
   * is added to it before returning.
   */
  used: Set<string>;
  random?: () => number;
}

/** Collision attempts allowed before giving up (6 suffix widths × 10) */
const MAX_SUFFIX_ATTEMPTS = 60;
const ATTEMPTS_PER_WIDTH = 10;

const RESERVED = new Set<string>(ROLE_ALIASES);

function pick<T>(items: readonly T[], random: () => number): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty pool');
  }
  return item;
}

/** Prefer names this domain has not used yet; fall back to the whole pool. */
function drawName(
  pool: readonly string[],
  taken: Set<string>,
  random: () => number
): string {
  const fresh = taken.size < pool.length ? pool.filter((n) => !taken.has(n)) : [];
  const name = pick(fresh.length > 0 ? fresh : pool, random);
  taken.add(name);
  return name;
}

function numericSuffix(attempt: number, random: () => number): number {
  const digits = 2 + Math.floor((attempt - 1) / ATTEMPTS_PER_WIDTH);
  const low = 10 ** (digits - 1);
  const high = 10 ** digits - 1;
  return low + Math.floor(random() * (high - low + 1));
}

function isTaken(candidate: string, used: Set<string>): boolean {
  return used.has(candidate) || RESERVED.has(candidate);
}

/**
 * Generate `count` realistic, globally unique local-parts for a domain.
 *
 * Each slot is `first` with probability `ratio`, otherwise `first.last`.
 * A candidate that is already taken gets a random numeric suffix; the
 * suffix widens every ten collisions.
 */
export function generateAliases(options: GenerateAliasesOptions): string[] {
  const {
    domain,
    count,
    pools,
    used,
    ratio = DEFAULT_FIRST_NAME_ONLY_RATIO,
    random = Math.random,
  } = options;

  const takenFirst = new Set<string>();
  const takenLast = new Set<string>();
  const result: string[] = [];

  for (let slot = 0; slot < count; slot++) {
    const firstOnly = random() < ratio;
    const first = drawName(pools.firstNames, takenFirst, random);
    const base = firstOnly
      ? first
      : `${first}.${drawName(pools.lastNames, takenLast, random)}`;

    let candidate = base.toLowerCase();
    let attempt = 0;
    while (isTaken(candidate, used)) {
      attempt++;
      if (attempt > MAX_SUFFIX_ATTEMPTS) {
        throw new AliasGenerationError(`${base}@${domain}`, MAX_SUFFIX_ATTEMPTS);
      }
      candidate = `${base}${numericSuffix(attempt, random)}`;
    }

    used.add(candidate);
    result.push(candidate);
  }

  return result;
}

/** True for aliases in the single-name format (`emma`, `emma42`) */
export function isFirstNameOnly(localPart: string): boolean {
  return !localPart.includes('.');
}

export function isRoleAlias(localPart: string): boolean {
  return RESERVED.has(localPart);
}

import { IllegalTransitionError } from './errors.js';
import type { DomainRecord, DomainState, Phase, Stage } from './types.js';

/** Stage a phase produces on success */
export const PHASE_TARGET: Record<Phase, Stage> = {
  registration: 'ProviderRegistered',
  dns: 'DnsConfigured',
  verification: 'Verified',
  aliases: 'AliasesCreated',
};

/** Step to execute next; `completion` only checks the alias count */
export type NextStep = Phase | 'completion';

const STAGE_NEXT: Record<Stage, NextStep | null> = {
  Pending: 'registration',
  ProviderRegistered: 'dns',
  DnsConfigured: 'verification',
  Verified: 'aliases',
  AliasesCreated: 'completion',
  Completed: null,
};

type StateKey = Stage | `Failed:${Phase}`;

function key(state: DomainState): StateKey {
  return state.status === 'Failed' ? `Failed:${state.phase}` : state.status;
}

function failed(phase: Phase): StateKey {
  return `Failed:${phase}`;
}

/**
 * Every legal move. Forward stages advance one step or fail in the phase
 * they are about to run; a failed phase may only be retried.
 */
const TRANSITIONS: Record<StateKey, readonly StateKey[]> = {
  Pending: ['ProviderRegistered', failed('registration')],
  ProviderRegistered: ['DnsConfigured', failed('dns')],
  DnsConfigured: ['Verified', failed('verification')],
  Verified: ['AliasesCreated', failed('aliases')],
  AliasesCreated: ['Completed'],
  Completed: [],
  'Failed:registration': ['ProviderRegistered', failed('registration')],
  'Failed:dns': ['DnsConfigured', failed('dns')],
  'Failed:verification': ['Verified', failed('verification')],
  'Failed:aliases': ['AliasesCreated', failed('aliases')],
};

export function canTransition(from: DomainState, to: DomainState): boolean {
  return TRANSITIONS[key(from)].includes(key(to));
}

/** Move a record to `next`, rejecting anything outside the transition table. */
export function transition(record: DomainRecord, next: DomainState): void {
  if (!canTransition(record.state, next)) {
    throw new IllegalTransitionError(record.name, key(record.state), key(next));
  }
  record.state = next;
}

/** What the pipeline has to do next for a domain, or `null` when done */
export function nextStep(state: DomainState): NextStep | null {
  if (state.status === 'Failed') return state.phase;
  return STAGE_NEXT[state.status];
}

export function describeState(state: DomainState): string {
  return state.status === 'Failed' ? `Failed{${state.phase}}` : state.status;
}

export function createDomainRecord(name: string): DomainRecord {
  return {
    name,
    state: { status: 'Pending' },
    providerId: '',
    verificationToken: '',
    hasMxRecord: false,
    hasTxtRecord: false,
    aliases: [],
    errors: [],
    attemptCounts: {},
  };
}

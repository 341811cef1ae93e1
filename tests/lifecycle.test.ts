import { describe, expect, it } from 'vitest';
import { IllegalTransitionError } from '../src/errors.js';
import {
  canTransition,
  createDomainRecord,
  describeState,
  nextStep,
  transition,
} from '../src/lifecycle.js';

describe('lifecycle', () => {
  it('starts new records as Pending with empty fields', () => {
    expect(createDomainRecord('a.test')).toEqual({
      name: 'a.test',
      state: { status: 'Pending' },
      providerId: '',
      verificationToken: '',
      hasMxRecord: false,
      hasTxtRecord: false,
      aliases: [],
      errors: [],
      attemptCounts: {},
    });
  });

  it('walks the forward stages one step at a time', () => {
    const record = createDomainRecord('a.test');
    for (const status of [
      'ProviderRegistered',
      'DnsConfigured',
      'Verified',
      'AliasesCreated',
      'Completed',
    ] as const) {
      transition(record, { status });
    }
    expect(record.state).toEqual({ status: 'Completed' });
  });

  it('rejects regressions and skipped stages', () => {
    const record = createDomainRecord('a.test');
    expect(() => transition(record, { status: 'Verified' })).toThrow(IllegalTransitionError);

    record.state = { status: 'Completed' };
    expect(() => transition(record, { status: 'Pending' })).toThrow(
      'Illegal state transition for a.test: Completed → Pending'
    );
  });

  it('only fails in the phase a stage is about to run', () => {
    expect(canTransition({ status: 'ProviderRegistered' }, { status: 'Failed', phase: 'dns' })).toBe(true);
    expect(
      canTransition({ status: 'ProviderRegistered' }, { status: 'Failed', phase: 'verification' })
    ).toBe(false);
    expect(canTransition({ status: 'Completed' }, { status: 'Failed', phase: 'aliases' })).toBe(false);
  });

  it('lets a failed phase be retried or completed, nothing else', () => {
    const failed = { status: 'Failed' as const, phase: 'verification' as const };
    expect(canTransition(failed, { status: 'Verified' })).toBe(true);
    expect(canTransition(failed, failed)).toBe(true);
    expect(canTransition(failed, { status: 'Pending' })).toBe(false);
    expect(canTransition(failed, { status: 'AliasesCreated' })).toBe(false);
  });

  it('reports the next step for every state', () => {
    expect(nextStep({ status: 'Pending' })).toBe('registration');
    expect(nextStep({ status: 'ProviderRegistered' })).toBe('dns');
    expect(nextStep({ status: 'DnsConfigured' })).toBe('verification');
    expect(nextStep({ status: 'Verified' })).toBe('aliases');
    expect(nextStep({ status: 'AliasesCreated' })).toBe('completion');
    expect(nextStep({ status: 'Completed' })).toBeNull();
    expect(nextStep({ status: 'Failed', phase: 'dns' })).toBe('dns');
  });

  it('describes failed states with their phase', () => {
    expect(describeState({ status: 'Failed', phase: 'aliases' })).toBe('Failed{aliases}');
    expect(describeState({ status: 'Verified' })).toBe('Verified');
  });
});

import { describe, expect, it } from 'vitest';
import {
  describeRecord,
  getForwardingRecords,
  quoteTxt,
  recordIdentity,
  unquoteTxt,
} from '../src/records.js';

describe('getForwardingRecords', () => {
  it('returns the verification TXT, catch-all TXT and both MX records', () => {
    expect(getForwardingRecords('Example.com', 'abc123', 'inbox@example.org')).toEqual([
      {
        type: 'TXT',
        name: 'example.com',
        value: '"forward-email-site-verification=abc123"',
        proxied: false,
        purpose: 'verification',
      },
      {
        type: 'TXT',
        name: 'example.com',
        value: '"forward-email=inbox@example.org"',
        proxied: false,
        purpose: 'catch-all',
      },
      {
        type: 'MX',
        name: 'example.com',
        value: 'mx1.forwardemail.net',
        priority: 10,
        proxied: false,
        purpose: 'mx',
      },
      {
        type: 'MX',
        name: 'example.com',
        value: 'mx2.forwardemail.net',
        priority: 10,
        proxied: false,
        purpose: 'mx',
      },
    ]);
  });

  it('labels records for error messages', () => {
    const labels = getForwardingRecords('a.test', 't', 'x@y.test').map(describeRecord);
    expect(labels).toEqual([
      'TXT verification',
      'TXT catch-all',
      'MX mx1.forwardemail.net',
      'MX mx2.forwardemail.net',
    ]);
  });
});

describe('recordIdentity', () => {
  it('keys TXT records by attribute, quoted or not', () => {
    expect(recordIdentity('TXT', '"forward-email-site-verification=old"')).toBe(
      recordIdentity('txt', 'forward-email-site-verification=new')
    );
    expect(recordIdentity('TXT', '"forward-email=a@b.test"')).not.toBe(
      recordIdentity('TXT', '"forward-email-site-verification=x"')
    );
  });

  it('keys MX records by exchanger host', () => {
    expect(recordIdentity('MX', 'MX1.forwardemail.net.')).toBe('MX:mx1.forwardemail.net');
    expect(recordIdentity('MX', 'mx2.forwardemail.net')).not.toBe(
      recordIdentity('MX', 'mx1.forwardemail.net')
    );
  });
});

describe('TXT quoting', () => {
  it('quotes and unquotes values', () => {
    expect(quoteTxt('v=spf1 -all')).toBe('"v=spf1 -all"');
    expect(unquoteTxt('"v=spf1 -all"')).toBe('v=spf1 -all');
    expect(unquoteTxt('bare')).toBe('bare');
  });
});

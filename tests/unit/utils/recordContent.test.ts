/**
 * SRV and CAA content parsing tests
 */
import { describe, it, expect } from 'vitest';
import { parseCaaContent, parseSrvContent } from '../../../src/utils/recordContent.js';

describe('parseSrvContent', () => {
  it('should parse weight, port and target', () => {
    expect(parseSrvContent(' 5  5060 sip.example.com ')).toEqual({ weight: 5, port: 5060, target: 'sip.example.com' });
  });

  it('should reject values out of range', () => {
    expect(parseSrvContent('5 70000 sip.example.com')).toBeNull();
    expect(parseSrvContent('65536 80 sip.example.com')).toBeNull();
  });

  it('should reject incomplete content', () => {
    expect(parseSrvContent('5060 sip.example.com')).toBeNull();
    expect(parseSrvContent('')).toBeNull();
  });
});

describe('parseCaaContent', () => {
  it('should parse quoted and bare values', () => {
    expect(parseCaaContent('0 issue "letsencrypt.org"')).toEqual({ flags: 0, tag: 'issue', value: 'letsencrypt.org' });
    expect(parseCaaContent('128 iodef mailto:security@example.com')).toEqual({
      flags: 128,
      tag: 'iodef',
      value: 'mailto:security@example.com',
    });
  });

  it('should lower-case the tag', () => {
    expect(parseCaaContent('0 ISSUEWILD ca.example.net')?.tag).toBe('issuewild');
  });

  it('should reject unknown tags, large flags and empty values', () => {
    expect(parseCaaContent('0 sign ca.example.net')).toBeNull();
    expect(parseCaaContent('256 issue ca.example.net')).toBeNull();
    expect(parseCaaContent('0 issue ""')).toBeNull();
  });
});

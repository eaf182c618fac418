import { describe, expect, it } from 'vitest';

import { tldtsSplitter } from '@/modules/wordlist/shell/domain/tldts-splitter.js';

describe('tldtsSplitter', () => {
  it('splits a host under a multi-label public suffix', () => {
    expect(tldtsSplitter.split('www.example.co.uk')).toEqual({
      subdomain: 'www',
      domain: 'example',
      suffix: 'co.uk',
    });
  });

  it('keeps nested subdomains together', () => {
    expect(tldtsSplitter.split('a.b.example.com')).toEqual({
      subdomain: 'a.b',
      domain: 'example',
      suffix: 'com',
    });
  });

  it('returns IP addresses whole as the domain', () => {
    expect(tldtsSplitter.split('192.168.0.1')).toEqual({
      subdomain: '',
      domain: '192.168.0.1',
      suffix: '',
    });
  });

  it('returns an empty split for an empty host', () => {
    expect(tldtsSplitter.split('')).toEqual({ subdomain: '', domain: '', suffix: '' });
  });
});

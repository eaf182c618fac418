/**
 * Public suffix list backed domain splitter.
 */

import { parse } from 'tldts';

import type { DomainSplitter } from '../../core/ports.js';
import type { DomainSplit } from '../../core/types.js';

const EMPTY_SPLIT: DomainSplit = { subdomain: '', domain: '', suffix: '' };

/**
 * Splits hosts with `tldts`.
 *
 * - IP addresses are returned whole as the domain.
 * - Hosts under a listed ICANN suffix split into subdomain, domain and suffix.
 * - Hosts under an unlisted suffix ("localhost", "intranet.corp") have no
 *   suffix: the last label is the domain and the rest the subdomain.
 */
export const tldtsSplitter: DomainSplitter = {
  split(host: string): DomainSplit {
    if (host === '') {
      return EMPTY_SPLIT;
    }

    const result = parse(host);
    const hostname = result.hostname ?? host;

    if (result.isIp === true) {
      return { subdomain: '', domain: hostname, suffix: '' };
    }

    if (result.isIcann === true) {
      return {
        subdomain: result.subdomain ?? '',
        domain: result.domainWithoutSuffix ?? '',
        suffix: result.publicSuffix ?? '',
      };
    }

    const labels = hostname.split('.').filter((label) => label !== '');
    const domain = labels.pop() ?? '';
    return { subdomain: labels.join('.'), domain, suffix: '' };
  },
};

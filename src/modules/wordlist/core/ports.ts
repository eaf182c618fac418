/**
 * Wordlist Module - Port Interfaces
 *
 * Contracts the shell layer implements for the core.
 */

import type { DomainSplit } from './types.js';

/**
 * Splits a host into subdomain, registrable domain and public suffix.
 * Backed by the public suffix list; implementations never throw and return
 * empty strings for parts they cannot determine.
 */
export interface DomainSplitter {
  split(host: string): DomainSplit;
}

/**
 * Logger interface for generation progress.
 */
export interface WordlistLogger {
  debug(context: Record<string, unknown>, message: string): void;
  info(context: Record<string, unknown>, message: string): void;
}

import { lookup } from 'whois';
import { WhoisNoRecordError, WhoisTimeoutError } from '../errors';

/**
 * Options for a single WHOIS lookup
 */
export interface IWhoisQueryOptions {
  /** Give up after this many milliseconds, 0 waits forever */
  timeoutMs: number;
}

// Markers WHOIS servers use to say they hold no record for the name
const NO_RECORD_PATTERNS: readonly RegExp[] = [
  /^not found/im,
  /^no data found/im,
  /^no entries found/im,
  /^%?\s*no match/im,
  /status:\s*free/i,
  /status:\s*available/i,
  /the queried object does not exist/i,
  /no object found/i
];

/**
 * Whether a raw WHOIS response says the domain has no record
 */
export function isNoRecordResponse(response: string): boolean {
  return NO_RECORD_PATTERNS.some(pattern => pattern.test(response));
}

/**
 * Perform one WHOIS lookup.
 * Resolves with the raw response text; rejects on transport errors, on timeout
 * and when the server reports that no record exists.
 */
export function queryWhois(domain: string, options: IWhoisQueryOptions): Promise<string> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const timeoutId = options.timeoutMs > 0
      ? setTimeout(() => {
          settled = true;
          reject(new WhoisTimeoutError(domain, options.timeoutMs));
        }, options.timeoutMs)
      : undefined;

    // The socket deadline matches ours so a timed-out lookup does not hold the process open
    const lookupOptions = options.timeoutMs > 0 ? { timeout: options.timeoutMs } : {};

    lookup(domain, lookupOptions, (error, data) => {
      clearTimeout(timeoutId);
      if (settled) {
        return;
      }
      settled = true;

      if (error) {
        reject(error);
        return;
      }

      if (isNoRecordResponse(data)) {
        reject(new WhoisNoRecordError(domain));
        return;
      }
      resolve(data);
    });
  });
}

import type { AvailabilityStatus } from './AvailabilityStatus';

/**
 * Classification of a failed WHOIS query
 */
export type ProbeFaultType =
  | 'NO_RECORD'
  | 'TIMEOUT'
  | 'NETWORK'
  | 'UNSUPPORTED_TLD'
  | 'PROTOCOL';

/**
 * Reason a WHOIS query did not complete
 */
export interface IProbeFault {
  type: ProbeFaultType;
  message: string;
}

/**
 * Interface representing the outcome of probing one domain
 */
export interface IProbeResult {
  /** Full domain name that was queried */
  domain: string;
  /** Verdict derived from the query outcome */
  status: AvailabilityStatus;
  /** Present whenever the query faulted, whatever the verdict */
  fault?: IProbeFault;
  /** Wall-clock time spent on the query in milliseconds */
  executionTime: number;
  /** Timestamp when the query finished */
  checkedAt: Date;
}

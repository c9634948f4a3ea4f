import type { IProbeResult } from './IProbeResult';

/**
 * Aggregated outcome of a scan, every list in candidate generation order
 */
export interface IScanReport {
  /** Domains classified as available */
  available: string[];
  /** Domains classified as registered */
  registered: string[];
  /** Probe results whose verdict could not be decided (strict verdicts only) */
  unknown: IProbeResult[];
  /** Every probe result, one per candidate */
  results: IProbeResult[];
  /** Total scan time in milliseconds */
  totalExecutionTime: number;
}

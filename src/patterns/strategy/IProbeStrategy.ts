import type { IProbeResult } from '../../models';

/**
 * Interface for availability probe implementations
 * Lets the scan engine run against WHOIS or any stand-in
 */
export interface IProbeStrategy {
  /**
   * Query one fully-qualified domain and classify it
   * @param domain - Full domain name to probe
   * @returns Promise resolving to the probe result; query faults are reported, not thrown
   */
  probe(domain: string): Promise<IProbeResult>;

  /**
   * Get the name/identifier of this strategy
   */
  getName(): string;

  /**
   * Get strategy-specific configuration
   */
  getConfig(): IProbeConfig;

  /**
   * Set strategy configuration
   * @param config - Configuration fields to override
   */
  setConfig(config: Partial<IProbeConfig>): void;
}

/**
 * Configuration for probe strategies
 */
export interface IProbeConfig {
  /** Per-query timeout in milliseconds, 0 for none */
  timeoutMs: number;
  /**
   * Report failed queries as UNKNOWN instead of AVAILABLE.
   * Only an explicit "no record" answer then counts as available.
   */
  strictVerdicts: boolean;
}

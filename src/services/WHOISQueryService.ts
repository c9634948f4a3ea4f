import type { IProbeFault, IProbeResult, ProbeFaultType } from '../models';
import { AvailabilityStatus } from '../models/AvailabilityStatus';
import type { IProbeConfig, IProbeStrategy } from '../patterns/strategy/IProbeStrategy';
import { WhoisNoRecordError, WhoisTimeoutError, toError } from '../errors';
import { queryWhois } from './WhoisClient';

const NETWORK_ERROR_CODES = new Set([
  'ENOTFOUND',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH'
]);

/**
 * WHOIS Query Service - classifies a domain from the outcome of a single WHOIS query
 *
 * A query that completes counts as registered; the response body is never
 * parsed for ownership or expiry. A query that faults counts as available,
 * or as unknown under strict verdicts unless the server said "no record".
 *
 * Known limitation: a registered domain whose WHOIS server has no record for
 * it, or a query that fails for any transient reason, is reported available
 * in the default mode.
 */
export class WHOISQueryService implements IProbeStrategy {
  private config: IProbeConfig = {
    timeoutMs: 0, // single attempt, no deadline
    strictVerdicts: false
  };

  constructor(config?: Partial<IProbeConfig>) {
    if (config) {
      this.setConfig(config);
    }
  }

  /**
   * Probe one domain with exactly one WHOIS query
   * @param domain - Full domain name to check
   * @returns Promise resolving to the probe result, never rejecting on query faults
   */
  async probe(domain: string): Promise<IProbeResult> {
    const startTime = Date.now();

    try {
      await queryWhois(domain, { timeoutMs: this.config.timeoutMs });
      return {
        domain,
        status: AvailabilityStatus.REGISTERED,
        executionTime: Date.now() - startTime,
        checkedAt: new Date()
      };
    } catch (error) {
      const fault = WHOISQueryService.classifyFault(error);
      return {
        domain,
        status: this.statusForFault(fault),
        fault,
        executionTime: Date.now() - startTime,
        checkedAt: new Date()
      };
    }
  }

  /**
   * Boolean shorthand: true when the WHOIS query completed
   */
  async isRegistered(domain: string): Promise<boolean> {
    const result = await this.probe(domain);
    return result.status === AvailabilityStatus.REGISTERED;
  }

  getName(): string {
    return 'WHOISQueryService';
  }

  /**
   * Get the current configuration
   * @returns Copy of the configuration object
   */
  getConfig(): IProbeConfig {
    return { ...this.config };
  }

  /**
   * Set configuration options
   * @param config - Configuration fields to override
   */
  setConfig(config: Partial<IProbeConfig>): void {
    this.config = { ...this.config, ...config };
    this.config.timeoutMs = Math.max(0, this.config.timeoutMs);
  }

  /**
   * Map whatever the WHOIS client threw to a fault category
   */
  static classifyFault(error: unknown): IProbeFault {
    const err = toError(error);
    return { type: WHOISQueryService.faultType(err), message: err.message };
  }

  private static faultType(error: Error): ProbeFaultType {
    if (error instanceof WhoisNoRecordError) {
      return 'NO_RECORD';
    }
    if (error instanceof WhoisTimeoutError || /^lookup: timeout/i.test(error.message)) {
      return 'TIMEOUT';
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return 'NETWORK';
    }
    if (/no whois server/i.test(error.message)) {
      return 'UNSUPPORTED_TLD';
    }
    return 'PROTOCOL';
  }

  private statusForFault(fault: IProbeFault): AvailabilityStatus {
    if (!this.config.strictVerdicts || fault.type === 'NO_RECORD') {
      return AvailabilityStatus.AVAILABLE;
    }
    return AvailabilityStatus.UNKNOWN;
  }
}

import pLimit from 'p-limit';
import type { ICandidate, IProbeResult, IScanReport } from '../models';
import { AvailabilityStatus } from '../models/AvailabilityStatus';
import type { IProbeStrategy } from '../patterns/strategy/IProbeStrategy';

/**
 * Callbacks invoked while a scan runs
 */
export interface IScanCallbacks {
  /** Called before a candidate's probe starts; a throw aborts the scan */
  onCheckStart?: (candidate: ICandidate, index: number, total: number) => void;
  /** Called once a candidate's probe has finished */
  onCheckComplete?: (result: IProbeResult, index: number, total: number) => void;
}

/**
 * Scan engine configuration
 */
export interface IScanEngineConfig {
  /** Probes in flight at once; 1 scans strictly in order */
  concurrency: number;
}

export const MAX_CONCURRENCY = 32;

/**
 * Domain Scan Engine - runs the probe over every candidate and aggregates verdicts
 * Results are slotted by candidate index, so report order is generation order
 * whatever order the probes finish in.
 */
export class DomainScanEngine {
  private config: IScanEngineConfig = {
    concurrency: 1
  };

  constructor(private readonly strategy: IProbeStrategy, config?: Partial<IScanEngineConfig>) {
    if (config) {
      this.setConfig(config);
    }
  }

  getConfig(): IScanEngineConfig {
    return { ...this.config };
  }

  /**
   * Set configuration options
   * @param config - Configuration fields to override
   */
  setConfig(config: Partial<IScanEngineConfig>): void {
    const merged = { ...this.config, ...config };
    if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${merged.concurrency}`);
    }
    this.config = { ...merged, concurrency: Math.min(merged.concurrency, MAX_CONCURRENCY) };
  }

  /**
   * Probe every candidate and return the domains found available
   * @param candidates - Candidates in generation order
   * @param statusCallback - Called with each domain before it is probed
   * @returns Available domains in generation order
   */
  async findAvailableDomains(
    candidates: readonly ICandidate[],
    statusCallback?: (domain: string) => void
  ): Promise<string[]> {
    const callbacks: IScanCallbacks = statusCallback
      ? { onCheckStart: candidate => statusCallback(candidate.domain) }
      : {};
    const report = await this.scan(candidates, callbacks);
    return report.available;
  }

  /**
   * Probe every candidate and return the full report
   * @param candidates - Candidates in generation order
   * @param callbacks - Optional progress callbacks
   */
  async scan(candidates: readonly ICandidate[], callbacks: IScanCallbacks = {}): Promise<IScanReport> {
    const startTime = Date.now();
    const total = candidates.length;
    const slots: Array<IProbeResult | undefined> = new Array(total);
    const limit = pLimit(this.config.concurrency);
    let aborted = false;

    const runOne = async (candidate: ICandidate, index: number): Promise<void> => {
      if (aborted) {
        return;
      }
      try {
        callbacks.onCheckStart?.(candidate, index, total);
        const result = await this.strategy.probe(candidate.domain);
        if (aborted) {
          return;
        }
        slots[index] = result;
        callbacks.onCheckComplete?.(result, index, total);
      } catch (error) {
        // Nothing queued behind this candidate may start
        aborted = true;
        throw error;
      }
    };

    await Promise.all(candidates.map((candidate, index) => limit(() => runOne(candidate, index))));

    return DomainScanEngine.buildReport(slots, Date.now() - startTime);
  }

  private static buildReport(slots: ReadonlyArray<IProbeResult | undefined>, totalExecutionTime: number): IScanReport {
    const results = slots.filter((result): result is IProbeResult => result !== undefined);

    return {
      available: results.filter(r => r.status === AvailabilityStatus.AVAILABLE).map(r => r.domain),
      registered: results.filter(r => r.status === AvailabilityStatus.REGISTERED).map(r => r.domain),
      unknown: results.filter(r => r.status === AvailabilityStatus.UNKNOWN),
      results,
      totalExecutionTime
    };
  }
}

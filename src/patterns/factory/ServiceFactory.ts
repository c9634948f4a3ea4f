import type { IProbeStrategy } from '../strategy/IProbeStrategy';
import type { IScanOptions } from '../../config/ScanOptions';
import { WHOISQueryService } from '../../services/WHOISQueryService';
import { DomainScanEngine } from '../../services/DomainScanEngine';

/**
 * Service Factory - builds the prober and scan engine for a set of scan options
 */
export class ServiceFactory {
  /**
   * Create a WHOIS prober configured from the scan options
   */
  createWHOISService(options: Pick<IScanOptions, 'timeoutMs' | 'strictVerdicts'>): WHOISQueryService {
    return new WHOISQueryService({
      timeoutMs: options.timeoutMs,
      strictVerdicts: options.strictVerdicts
    });
  }

  /**
   * Create a scan engine around a prober
   * @param options - Resolved scan options
   * @param strategy - Prober to use, reconfigured from the options; a WHOIS prober is built when omitted
   */
  createScanEngine(options: IScanOptions, strategy?: IProbeStrategy): DomainScanEngine {
    let prober: IProbeStrategy;
    if (strategy) {
      strategy.setConfig({ timeoutMs: options.timeoutMs, strictVerdicts: options.strictVerdicts });
      prober = strategy;
    } else {
      prober = this.createWHOISService(options);
    }
    return new DomainScanEngine(prober, { concurrency: options.concurrency });
  }
}

import type { IScanReport } from '../models';
import type { IScanOptions } from '../config/ScanOptions';

/**
 * Interface for Domain Controller - main orchestration layer
 */
export interface IDomainController {
  /**
   * Load inputs, scan every candidate and present the outcome
   * @param options - Resolved scan options
   * @returns Promise resolving to the scan report
   */
  run(options: IScanOptions): Promise<IScanReport>;
}

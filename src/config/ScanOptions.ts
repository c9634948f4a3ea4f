import { MAX_CONCURRENCY } from '../services/DomainScanEngine';

/**
 * Options for one scan run, as assembled by the command line
 */
export interface IScanOptions {
  /** File holding one base string per line */
  inputPath: string;
  /** YAML document listing top_level_domains */
  configPath: string;
  /** Probes in flight at once */
  concurrency: number;
  /** Per-probe timeout in milliseconds, 0 for none */
  timeoutMs: number;
  /** Keep failed queries apart from confirmed absences */
  strictVerdicts: boolean;
  /** Print resolved options and per-probe timings */
  verbose: boolean;
}

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/** Timeout applied to pooled scans that did not set one */
export const DEFAULT_POOLED_TIMEOUT_MS = 10000;

const DEFAULT_OPTIONS: Omit<IScanOptions, 'inputPath' | 'timeoutMs'> = {
  configPath: DEFAULT_CONFIG_PATH,
  concurrency: 1,
  strictVerdicts: false,
  verbose: false
};

/**
 * Fill in defaults and enforce the pooled-scan rules.
 * Concurrency is capped at MAX_CONCURRENCY. An unset timeout means none for a
 * sequential scan and DEFAULT_POOLED_TIMEOUT_MS for a pooled one; a pooled scan
 * may not ask for no timeout at all.
 */
export function resolveScanOptions(options: Partial<IScanOptions> & Pick<IScanOptions, 'inputPath'>): IScanOptions {
  const { timeoutMs: requestedTimeout, ...rest } = options;
  const merged = { ...DEFAULT_OPTIONS, ...rest };

  if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${merged.concurrency}`);
  }
  if (requestedTimeout !== undefined && (!Number.isFinite(requestedTimeout) || requestedTimeout < 0)) {
    throw new RangeError(`timeoutMs must be zero or a positive number, got ${requestedTimeout}`);
  }

  const concurrency = Math.min(merged.concurrency, MAX_CONCURRENCY);
  if (concurrency > 1 && requestedTimeout === 0) {
    throw new RangeError('a pooled scan needs a per-query timeout above 0');
  }
  const timeoutMs = requestedTimeout ?? (concurrency > 1 ? DEFAULT_POOLED_TIMEOUT_MS : 0);

  return { ...merged, concurrency, timeoutMs };
}

/**
 * Base class for errors raised by the scanner itself
 */
export abstract class ScoutError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/**
 * Configuration document exists but cannot be used
 */
export class ConfigParseError extends ScoutError {
  public readonly configPath: string;

  constructor(configPath: string, reason: string, cause?: unknown) {
    super(`Invalid configuration in ${configPath}: ${reason}`, 'CONFIG_PARSE_ERROR', { cause });
    this.configPath = configPath;
  }
}

/**
 * WHOIS lookup did not answer within the configured time
 */
export class WhoisTimeoutError extends ScoutError {
  constructor(domain: string, timeoutMs: number) {
    super(`WHOIS lookup for ${domain} timed out after ${timeoutMs}ms`, 'WHOIS_TIMEOUT');
  }
}

/**
 * WHOIS server answered that it holds no record for the domain
 */
export class WhoisNoRecordError extends ScoutError {
  constructor(domain: string) {
    super(`No WHOIS record found for ${domain}`, 'WHOIS_NO_RECORD');
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

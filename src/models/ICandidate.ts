/**
 * A generated domain awaiting an availability verdict
 */
export interface ICandidate {
  /** Fully-qualified domain name (e.g. "example.com") */
  readonly domain: string;
  /** Base string the domain was built from (e.g. "example") */
  readonly base: string;
  /** Top-level domain without the leading dot (e.g. "com") */
  readonly tld: string;
}

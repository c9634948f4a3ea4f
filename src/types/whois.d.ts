declare module 'whois' {
  interface WhoisOptions {
    /** Socket timeout in milliseconds */
    timeout?: number;
  }

  type WhoisCallback = (err: Error | null, data: string) => void;

  function lookup(domain: string, options: WhoisOptions, callback: WhoisCallback): void;

  export { lookup, WhoisOptions, WhoisCallback };
}

import type { IProbeResult, IScanReport } from '../models';

export type LineWriter = (line: string) => void;

/**
 * Console presenter - renders scan progress and the final report line by line
 */
export class ConsolePresenter {
  constructor(
    private readonly write: LineWriter = line => console.log(line),
    private readonly debug: LineWriter = line => console.debug(line)
  ) {}

  /**
   * Progress line printed before each probe
   */
  printStatus(domain: string): void {
    this.write(`Checking: ${domain}`);
  }

  /**
   * Print the available domains, or a notice when there are none
   */
  printResults(availableDomains: readonly string[]): void {
    if (availableDomains.length === 0) {
      this.write('No available domains found.');
      return;
    }

    this.write('Available domains:');
    availableDomains.forEach(domain => this.write(domain));
  }

  /**
   * Print the full report: available domains, then inconclusive ones if any
   */
  printReport(report: IScanReport): void {
    this.printResults(report.available);

    if (report.unknown.length > 0) {
      this.write('Inconclusive domains:');
      report.unknown.forEach(result => this.write(ConsolePresenter.describeUnknown(result)));
    }
  }

  /**
   * Verbose per-probe timing line
   */
  printTiming(result: IProbeResult): void {
    this.debug(`${result.domain}: ${result.status} in ${result.executionTime}ms`);
  }

  printDebug(message: string): void {
    this.debug(message);
  }

  private static describeUnknown(result: IProbeResult): string {
    return result.fault
      ? `${result.domain} (${result.fault.type}: ${result.fault.message})`
      : result.domain;
  }
}

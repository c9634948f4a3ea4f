import type { IScanReport } from '../models';
import type { IScanOptions } from '../config/ScanOptions';
import type { IDomainController } from './IDomainController';
import type { IProbeStrategy } from '../patterns/strategy/IProbeStrategy';
import type { IScanCallbacks } from '../services/DomainScanEngine';
import { ServiceFactory } from '../patterns/factory/ServiceFactory';
import { ConsolePresenter } from '../ui/ConsolePresenter';
import { generateDomainCombinations } from '../services/CombinationGenerator';
import { loadConfig } from '../loaders/ConfigLoader';
import { loadBaseStrings } from '../loaders/BaseStringLoader';

/**
 * Collaborators the controller can be given in place of the defaults
 */
export interface IDomainControllerDeps {
  factory?: ServiceFactory;
  presenter?: ConsolePresenter;
  /** Prober used instead of WHOIS */
  strategy?: IProbeStrategy;
}

/**
 * Domain Controller - wires loading, generation, scanning and presentation together
 */
export class DomainController implements IDomainController {
  private readonly factory: ServiceFactory;
  private readonly presenter: ConsolePresenter;
  private readonly strategy: IProbeStrategy | undefined;

  constructor(deps: IDomainControllerDeps = {}) {
    this.factory = deps.factory ?? new ServiceFactory();
    this.presenter = deps.presenter ?? new ConsolePresenter();
    this.strategy = deps.strategy;
  }

  /**
   * Run one scan end to end
   * Configuration parse errors and callback faults propagate to the caller.
   */
  async run(options: IScanOptions): Promise<IScanReport> {
    if (options.verbose) {
      this.presenter.printDebug(`Scan options: ${JSON.stringify(options)}`);
    }

    const tlds = loadConfig(options.configPath);
    const bases = loadBaseStrings(options.inputPath);
    const candidates = generateDomainCombinations(bases, tlds);

    if (options.verbose) {
      this.presenter.printDebug(`${bases.length} base strings x ${tlds.length} TLDs = ${candidates.length} candidates`);
    }

    const engine = this.factory.createScanEngine(options, this.strategy);
    const callbacks: IScanCallbacks = {
      onCheckStart: candidate => this.presenter.printStatus(candidate.domain)
    };
    if (options.verbose) {
      callbacks.onCheckComplete = result => this.presenter.printTiming(result);
    }

    const report = await engine.scan(candidates, callbacks);
    this.presenter.printReport(report);
    return report;
  }
}

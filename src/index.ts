export * from './models';
export * from './errors';
export { generateDomainCombinations } from './services/CombinationGenerator';
export { queryWhois, isNoRecordResponse } from './services/WhoisClient';
export type { IWhoisQueryOptions } from './services/WhoisClient';
export { WHOISQueryService } from './services/WHOISQueryService';
export { DomainScanEngine, MAX_CONCURRENCY } from './services/DomainScanEngine';
export type { IScanCallbacks, IScanEngineConfig } from './services/DomainScanEngine';
export type { IProbeStrategy, IProbeConfig } from './patterns/strategy/IProbeStrategy';
export { ServiceFactory } from './patterns/factory/ServiceFactory';
export { loadConfig } from './loaders/ConfigLoader';
export { loadBaseStrings } from './loaders/BaseStringLoader';
export { resolveScanOptions, DEFAULT_CONFIG_PATH, DEFAULT_POOLED_TIMEOUT_MS } from './config/ScanOptions';
export type { IScanOptions } from './config/ScanOptions';
export { ConsolePresenter } from './ui/ConsolePresenter';
export type { LineWriter } from './ui/ConsolePresenter';
export { DomainController } from './controllers/DomainController';
export type { IDomainController } from './controllers/IDomainController';

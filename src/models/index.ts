// Core enums
export { AvailabilityStatus } from './AvailabilityStatus';

// Core interfaces
export type { ICandidate } from './ICandidate';
export type { IProbeResult, IProbeFault, ProbeFaultType } from './IProbeResult';
export type { IScanReport } from './IScanReport';

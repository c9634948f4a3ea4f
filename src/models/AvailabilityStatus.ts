/**
 * Availability verdict attached to a single probed domain
 */
export enum AvailabilityStatus {
  REGISTERED = 'registered',
  AVAILABLE = 'available',
  /** Query failed and strict verdicts are enabled */
  UNKNOWN = 'unknown'
}

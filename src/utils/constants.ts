/**
 * Shared constants for return calculations.
 */

/** Average calendar year length used to turn day counts into fractional years. */
export const DAYS_PER_YEAR = 365.25;

export const MONTHS_PER_YEAR = 12;

/** Upper bound (inclusive) of percentage inputs such as success rate and fees. */
export const MAX_PERCENTAGE = 100;

/** Port used by the HTTP server when PORT is not set. */
export const DEFAULT_PORT = 3000;

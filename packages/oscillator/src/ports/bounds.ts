/** Lowest legal position. */
export const LOW = 10_000

/** Highest legal position. */
export const HIGH = 99_999

/** `HIGH - LOW`. A choice is far smaller, so one reflection per step always suffices. */
export const RANGE_WIDTH = HIGH - LOW

export const MIN_CHOICE = 0
export const MAX_CHOICE = 63

/** Root position used when a caller does not pick one. */
export const DEFAULT_START = 50_000

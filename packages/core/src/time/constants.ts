/**
 * Time constants for consistent time calculations across the codebase.
 * All values are in milliseconds.
 */

const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;
/** Calendar months are approximated as 30 days for interval arithmetic */
export const MONTH_MS = 30 * DAY_MS;

/**
 * Time constants in milliseconds for consistent usage across the application
 *
 * This file centralizes all time-related constants to avoid hardcoding values
 * and ensure consistency in validation rules and application logic.
 */

// Base time units
export const ONE_SECOND_IN_MILLISECONDS = 1000;
export const ONE_MINUTE_IN_MILLISECONDS = 60 * ONE_SECOND_IN_MILLISECONDS;
export const ONE_HOUR_IN_MILLISECONDS = 60 * ONE_MINUTE_IN_MILLISECONDS;

// Common short durations
export const FIVE_SECONDS_IN_MILLISECONDS = 5 * ONE_SECOND_IN_MILLISECONDS;
export const TEN_SECONDS_IN_MILLISECONDS = 10 * ONE_SECOND_IN_MILLISECONDS;
export const THIRTY_SECONDS_IN_MILLISECONDS = 30 * ONE_SECOND_IN_MILLISECONDS;
export const FIVE_MINUTES_IN_MILLISECONDS = 5 * ONE_MINUTE_IN_MILLISECONDS;

// Sweep polling
export const POLL_INTERVAL_MIN_MS = 100;
export const POLL_INTERVAL_MAX_MS = ONE_MINUTE_IN_MILLISECONDS;
export const POLL_INTERVAL_DEFAULT_MS = ONE_SECOND_IN_MILLISECONDS;

// Configuration reload debounce
export const CONFIG_RELOAD_DEBOUNCE_MAX_MS = TEN_SECONDS_IN_MILLISECONDS;
export const CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS = 250;

// File change wake-up debounce
export const FILE_WATCH_DEBOUNCE_MS = 100;

// Per-channel delivery timeout
export const DELIVERY_TIMEOUT_MIN_MS = ONE_SECOND_IN_MILLISECONDS;
export const DELIVERY_TIMEOUT_MAX_MS = ONE_MINUTE_IN_MILLISECONDS;
export const DELIVERY_TIMEOUT_DEFAULT_MS = FIVE_SECONDS_IN_MILLISECONDS;

// Alert retry backoff
export const ALERT_BACKOFF_MIN_MS = 100;
export const ALERT_BACKOFF_MAX_MS = ONE_MINUTE_IN_MILLISECONDS;
export const ALERT_BACKOFF_DEFAULT_MS = 1000;

export const ALERT_MAX_BACKOFF_MIN_MS = 1000;
export const ALERT_MAX_BACKOFF_MAX_MS = FIVE_MINUTES_IN_MILLISECONDS;
export const ALERT_MAX_BACKOFF_DEFAULT_MS = THIRTY_SECONDS_IN_MILLISECONDS;

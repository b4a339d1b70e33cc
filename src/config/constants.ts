/**
 * Centralized configuration constants for mountwatch
 */

/**
 * File Watcher Configuration
 */
export const WATCHER_CONSTANTS = {
  /**
   * Interval between symlink chain checks in milliseconds.
   * Bounds how late a repointed link is noticed.
   */
  CHAIN_POLL_INTERVAL_MS: 1000,

  /** Delay before retrying a watch that could not be established */
  REWATCH_DELAY_MS: 1000,

  /** Minimum accepted poll interval */
  MIN_POLL_INTERVAL_MS: 10,

  /**
   * Undelivered raw events held per watch. Past this the watch closes, the
   * same way a kernel queue overflow would end it.
   */
  MAX_PENDING_EVENTS: 1024,
} as const;

/**
 * HTTP Server Configuration
 */
export const SERVER_CONSTANTS = {
  DEFAULT_PORT: 8080,

  DEFAULT_HOST: '0.0.0.0',

  /** Route the watched file is served on */
  DEFAULT_ROUTE: '/metrics',

  /** Prometheus text exposition format */
  DEFAULT_CONTENT_TYPE: 'text/plain; version=0.0.4; charset=utf-8',

  HEALTH_ROUTE: '/healthz',
} as const;

export const CONFIG_CONSTANTS = {
  /** Config file looked up in the working directory when none is given */
  DEFAULT_CONFIG_FILE: 'mountwatch.json',
} as const;

/**
 * Default configuration values.
 * Workflow files and CLI flags override the ones they expose.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  WAIT_FOR_ELEMENT: 30_000,
  CAPTURE_WINDOW: 3_000,
  CHECK_SETTLE: 500,
  DELAY_SECONDS: 5,
} as const;

export const README_GENERATION = {
  MAX_TOKENS: 1_500,
  TEMPERATURE: 0.5,
  OUTPUT_FILE: 'README.md',
} as const;

export const CAPTURE = {
  ENDPOINT_PATTERN: 'components/?',
} as const;

export const EXIT_CODES = {
  OK: 0,
  STEP_FAILED: 1,
  CONFIG_ERROR: 4,
} as const;

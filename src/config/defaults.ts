/**
 * Default configuration values.
 * Environment and config file values override these.
 */

export const DEFAULTS = {
  TEMPERATURE: 0,
  TOKEN_SCOPE: 'https://cognitiveservices.azure.com/.default',
  AGENTS_API: 'chat_completions',
  CONFIG_PATH: '.agent-clients.yaml',
} as const;

export const EXIT_CODES = {
  OK: 0,
  FAILED: 1,
  UNSUPPORTED_FRAMEWORK: 2,
  CONSTRUCTION_FAILED: 3,
  CONFIG_INVALID: 4,
} as const;

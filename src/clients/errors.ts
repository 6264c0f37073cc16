import { EXIT_CODES } from '../config/defaults.js';

// ── Client errors ────────────────────────────────────────────

export class UnsupportedFrameworkError extends Error {
  readonly exitCode = EXIT_CODES.UNSUPPORTED_FRAMEWORK;

  constructor(readonly framework: string) {
    super(`Unsupported framework: "${framework}"`);
    this.name = 'UnsupportedFrameworkError';
  }
}

/**
 * Any failure while building a framework client.
 * The underlying SDK or validation error is kept on `cause`.
 */
export class ClientConstructionError extends Error {
  readonly exitCode = EXIT_CODES.CONSTRUCTION_FAILED;

  constructor(
    readonly framework: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to construct ${framework} client: ${reason}`, { cause });
    this.name = 'ClientConstructionError';
  }
}

export class ToolBindingError extends Error {
  readonly exitCode = EXIT_CODES.CONSTRUCTION_FAILED;

  constructor(
    readonly framework: string,
    message: string,
  ) {
    super(message);
    this.name = 'ToolBindingError';
  }
}

// ── Config errors ────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG_INVALID;

  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid configuration in ${source}: ${reason}`, { cause });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration module.
 * Loads model settings from env and config files.
 * Zod-validated; config file values override the environment.
 */

import type { FileConfig } from '../schema/config.js';
import type { Environment } from './environment.js';

export { DEFAULTS, EXIT_CODES } from './defaults.js';
export { loadConfigFile } from './loader.js';
export { loadEnvironment } from './environment.js';
export type { Environment } from './environment.js';

// ── Merge ────────────────────────────────────────────────────

export function resolveSettings(
  environment: Environment,
  file?: FileConfig,
): Environment {
  if (file === undefined) return environment;

  return {
    framework: file.framework ?? environment.framework,
    experimentType: environment.experimentType,
    tokenScope: file.tokenScope ?? environment.tokenScope,
    model: {
      endpoint: file.endpoint ?? environment.model.endpoint,
      deployment: file.deployment ?? environment.model.deployment,
      modelName: file.modelName ?? environment.model.modelName,
      apiVersion: file.apiVersion ?? environment.model.apiVersion,
      temperature: file.temperature ?? environment.model.temperature,
    },
  };
}

import { ConfigError } from '../clients/errors.js';
import { environmentSchema } from '../schema/index.js';
import type { ModelSettings } from '../schema/index.js';
import { DEFAULTS } from './defaults.js';

// ── Types ───────────────────────────────────────────────────

export interface Environment {
  framework: string;
  experimentType: string | undefined;
  tokenScope: string;
  model: ModelSettings;
}

// ── Public API ──────────────────────────────────────────────

/**
 * Read the model settings and framework selector from environment variables.
 * Missing identifying fields are left empty; the client factory rejects them.
 */
export function loadEnvironment(
  env: Record<string, string | undefined> = process.env,
): Environment {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('environment', result.error);
  }

  const vars = result.data;

  return {
    framework: vars.FRAMEWORK,
    experimentType: vars.EXP_TYPE,
    tokenScope: vars.AZURE_TOKEN_SCOPE ?? DEFAULTS.TOKEN_SCOPE,
    model: {
      endpoint: vars.AZURE_ENDPOINT,
      deployment: vars.AZURE_DEPLOYMENT,
      modelName: vars.AZURE_MODEL_NAME,
      apiVersion: vars.AZURE_API_VERSION,
      temperature: vars.AZURE_TEMPERATURE ?? DEFAULTS.TEMPERATURE,
    },
  };
}

import { z } from 'zod';

import { DEFAULTS } from '../config/defaults.js';

// ── Token provider ───────────────────────────────────────────

/**
 * Bearer-token source handed in by the credential layer.
 * Forwarded to the SDKs as-is; nothing in this package calls it.
 */
export type TokenProvider = () => Promise<string>;

export const tokenProviderSchema = z.custom<TokenProvider>(
  (value) => typeof value === 'function',
  { message: 'tokenProvider must be a function returning a bearer token' },
);

// ── Model settings (serializable part) ──────────────────────

export const modelSettingsSchema = z.object({
  endpoint: z.string(),
  deployment: z.string(),
  modelName: z.string(),
  apiVersion: z.string(),
  temperature: z.number().min(0).max(2).default(DEFAULTS.TEMPERATURE),
});

export type ModelSettings = z.infer<typeof modelSettingsSchema>;

// ── Model configuration ──────────────────────────────────────

export const modelConfigSchema = modelSettingsSchema.extend({
  tokenProvider: tokenProviderSchema.optional(),
});

export type ModelConfig = Readonly<z.infer<typeof modelConfigSchema>>;

export type ModelConfigInput = z.input<typeof modelConfigSchema>;

/**
 * Identifying fields must be present by the time a client is built.
 * Plain `modelConfigSchema` lets them be empty so partial env loads still parse.
 */
export const resolvedModelConfigSchema = modelConfigSchema.extend({
  endpoint: z.string().url(),
  deployment: z.string().min(1),
  modelName: z.string().min(1),
  apiVersion: z.string().min(1),
});

export type ResolvedModelConfig = Readonly<z.infer<typeof resolvedModelConfigSchema>>;

export function createModelConfig(input: ModelConfigInput): ModelConfig {
  return Object.freeze(modelConfigSchema.parse(input));
}

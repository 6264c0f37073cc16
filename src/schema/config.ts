import { z } from 'zod';

import { frameworkSchema } from './framework.js';

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    framework: frameworkSchema.optional(),
    endpoint: z.string().url().optional(),
    deployment: z.string().min(1).optional(),
    modelName: z.string().min(1).optional(),
    apiVersion: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    tokenScope: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment ─────────────────────────────────────────────

export const environmentSchema = z.object({
  AZURE_ENDPOINT: z.string().default(''),
  AZURE_DEPLOYMENT: z.string().default(''),
  AZURE_MODEL_NAME: z.string().default(''),
  AZURE_API_VERSION: z.string().default(''),
  AZURE_TEMPERATURE: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().min(0).max(2).optional(),
  ),
  AZURE_TOKEN_SCOPE: z.string().min(1).optional(),
  FRAMEWORK: z.string().default(''),
  EXP_TYPE: z.string().min(1).optional(),
});

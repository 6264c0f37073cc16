import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../clients/errors.js';
import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.agent-clients.yaml` (or JSON) config file.
 * Throws ConfigError if the file is missing, unparsable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let parsed: unknown;
  try {
    const raw = await readFile(configPath, 'utf-8');
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(configPath, err);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(configPath, result.error);
  }
  return result.data;
}

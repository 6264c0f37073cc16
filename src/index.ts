/**
 * agent-model-clients — one model config, a client for every agent framework.
 */

export * from './schema/index.js';
export * from './clients/index.js';
export { DEFAULTS, loadConfigFile, loadEnvironment, resolveSettings } from './config/index.js';
export type { Environment } from './config/index.js';
export { createAzureTokenProvider } from './credentials/index.js';

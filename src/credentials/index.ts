/**
 * Credentials module.
 * The only place that talks to Azure identity.
 */

export { createAzureTokenProvider } from './tokenProvider.js';

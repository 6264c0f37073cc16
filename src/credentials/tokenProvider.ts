import { AzureCliCredential, getBearerTokenProvider } from '@azure/identity';
import type { TokenCredential } from '@azure/identity';

import { DEFAULTS } from '../config/defaults.js';
import type { TokenProvider } from '../schema/index.js';

/**
 * Bearer-token provider for Azure OpenAI.
 * Uses the signed-in Azure CLI account unless another credential is given.
 * No token is fetched until the provider is first called.
 */
export function createAzureTokenProvider(
  scope: string = DEFAULTS.TOKEN_SCOPE,
  credential: TokenCredential = new AzureCliCredential(),
): TokenProvider {
  return getBearerTokenProvider(credential, scope);
}

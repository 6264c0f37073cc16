/**
 * Client module.
 * Turns one canonical model config into the client a given agent framework
 * expects, and binds tools where that framework wants them on the client.
 */

export {
  createClient,
  bindTools,
  resolveFramework,
  toAutogenArgs,
  toLangGraphArgs,
  toOpenAIAgentsArgs,
} from './factory.js';
export type { ClientFactoryDeps, ToolBindableClient, ToolDefinition } from './factory.js';
export { defaultClientConstructors } from './constructors.js';
export type {
  AutogenClientArgs,
  ClientConstructors,
  ClientHandle,
  LangGraphClientArgs,
  OpenAIAgentsClientArgs,
} from './constructors.js';
export {
  AgentsDefaultsRegistry,
  defaultAgentsRegistry,
  sdkAgentsHooks,
  MIRRORED_ENV_KEYS,
} from './agentsRegistry.js';
export type {
  AgentsApi,
  AgentsDefaultsState,
  AgentsRegistration,
  AgentsSdkHooks,
  ProcessEnvironment,
} from './agentsRegistry.js';
export {
  AzureChatCompletionClient,
  ALL_CAPABILITIES,
  NO_CAPABILITIES,
} from './autogen.js';
export type { ModelCapabilities } from './autogen.js';
export { Model } from './model.js';
export {
  UnsupportedFrameworkError,
  ClientConstructionError,
  ToolBindingError,
  ConfigError,
} from './errors.js';

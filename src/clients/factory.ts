import type { BindToolsInput } from '@langchain/core/language_models/chat_models';

import {
  FRAMEWORK_LABELS,
  isFramework,
  resolvedModelConfigSchema,
} from '../schema/index.js';
import type { Framework, ModelConfig, ResolvedModelConfig } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { defaultAgentsRegistry } from './agentsRegistry.js';
import type { AgentsDefaultsRegistry } from './agentsRegistry.js';
import { defaultClientConstructors } from './constructors.js';
import type {
  AutogenClientArgs,
  ClientConstructors,
  ClientHandle,
  LangGraphClientArgs,
  OpenAIAgentsClientArgs,
} from './constructors.js';
import {
  ClientConstructionError,
  ToolBindingError,
  UnsupportedFrameworkError,
} from './errors.js';

// ── Types ────────────────────────────────────────────────────

export type ToolDefinition = BindToolsInput;

export interface ToolBindableClient {
  bindTools(
    tools: ToolDefinition[],
    kwargs?: { parallel_tool_calls?: boolean },
  ): ClientHandle;
}

export interface ClientFactoryDeps {
  constructors?: Partial<ClientConstructors>;
  agentsRegistry?: AgentsDefaultsRegistry;
}

// ── Framework selection ──────────────────────────────────────

export function resolveFramework(value: string): Framework {
  if (!isFramework(value)) {
    throw new UnsupportedFrameworkError(value);
  }
  return value;
}

// ── Shape translation ────────────────────────────────────────

export function toAutogenArgs(config: ResolvedModelConfig): AutogenClientArgs {
  return {
    model: config.modelName,
    azureEndpoint: config.endpoint,
    apiVersion: config.apiVersion,
    azureDeployment: config.deployment,
    azureADTokenProvider: config.tokenProvider,
    temperature: config.temperature,
  };
}

export function toLangGraphArgs(config: ResolvedModelConfig): LangGraphClientArgs {
  return {
    name: config.modelName,
    azureEndpoint: config.endpoint,
    apiVersion: config.apiVersion,
    azureDeployment: config.deployment,
    azureADTokenProvider: config.tokenProvider,
    temperature: config.temperature,
  };
}

export function toOpenAIAgentsArgs(
  config: ResolvedModelConfig,
): OpenAIAgentsClientArgs {
  return {
    azureEndpoint: config.endpoint,
    apiVersion: config.apiVersion,
    azureADTokenProvider: config.tokenProvider,
  };
}

// ── Construction helpers ─────────────────────────────────────

export function requireResolvedConfig(
  framework: Framework,
  config: ModelConfig,
): ResolvedModelConfig {
  const result = resolvedModelConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ClientConstructionError(framework, result.error);
  }
  return result.data;
}

export function withConstructionErrors<T>(framework: Framework, build: () => T): T {
  try {
    return build();
  } catch (err) {
    if (err instanceof ClientConstructionError) throw err;
    throw new ClientConstructionError(framework, err);
  }
}

// ── Client factory ───────────────────────────────────────────

/**
 * Build the client a framework expects from one canonical model config.
 *
 * `openai-agents` also registers the new client as the SDK's process-wide
 * default (chat completions API, tracing off) and mirrors the endpoint and
 * API version into the OPENAI_* environment variables. A later call with a
 * different config replaces that registration.
 */
export function createClient(
  framework: string,
  config: ModelConfig,
  deps: ClientFactoryDeps = {},
): ClientHandle {
  const target = resolveFramework(framework);
  const resolved = requireResolvedConfig(target, config);
  const constructors: ClientConstructors = {
    ...defaultClientConstructors,
    ...deps.constructors,
  };

  log.client(
    `Creating ${FRAMEWORK_LABELS[target]} client (deployment=${resolved.deployment}, apiVersion=${resolved.apiVersion})`,
  );

  switch (target) {
    case 'autogen':
      return withConstructionErrors(target, () =>
        constructors.autogen(toAutogenArgs(resolved)),
      );

    case 'langgraph':
      return withConstructionErrors(target, () =>
        constructors.langgraph(toLangGraphArgs(resolved)),
      );

    case 'openai-agents': {
      const registry = deps.agentsRegistry ?? defaultAgentsRegistry;
      return withConstructionErrors(target, () => {
        const client = constructors['openai-agents'](toOpenAIAgentsArgs(resolved));
        registry.register(client, {
          endpoint: resolved.endpoint,
          apiVersion: resolved.apiVersion,
        });
        return client;
      });
    }

    default: {
      const unhandled: never = target;
      throw new UnsupportedFrameworkError(String(unhandled));
    }
  }
}

// ── Tool binding ─────────────────────────────────────────────

function isToolBindable(client: ClientHandle): client is ToolBindableClient {
  return 'bindTools' in client && typeof client.bindTools === 'function';
}

/**
 * Attach tools to a client the way its framework expects.
 * Only LangGraph binds tools on the model; Autogen and OpenAI Agents take
 * them on the agent, so their clients come back untouched.
 */
export function bindTools(
  client: ClientHandle,
  framework: string,
  tools: ToolDefinition[],
  parallelToolCalls = true,
): ClientHandle {
  if (!isFramework(framework)) {
    log.warn(`bindTools: unknown framework "${framework}", returning client unchanged`);
    return client;
  }

  switch (framework) {
    case 'langgraph':
      if (!isToolBindable(client)) {
        throw new ToolBindingError(
          framework,
          'LangGraph client does not expose bindTools()',
        );
      }
      return client.bindTools(tools, { parallel_tool_calls: parallelToolCalls });

    case 'autogen':
    case 'openai-agents':
      return client;

    default: {
      const unhandled: never = framework;
      return unhandled;
    }
  }
}

import { AzureChatOpenAI } from '@langchain/openai';
import { AzureOpenAI } from 'openai';
import type OpenAI from 'openai';

import type { TokenProvider } from '../schema/index.js';
import { AzureChatCompletionClient } from './autogen.js';
import type { AutogenClientArgs } from './autogen.js';

// ── Constructor shapes ───────────────────────────────────────

export type { AutogenClientArgs } from './autogen.js';

export interface LangGraphClientArgs {
  name: string;
  azureEndpoint: string;
  apiVersion: string;
  azureDeployment: string;
  azureADTokenProvider: TokenProvider | undefined;
  temperature: number;
}

/** Model and temperature are chosen per agent run, not on the client. */
export interface OpenAIAgentsClientArgs {
  azureEndpoint: string;
  apiVersion: string;
  azureADTokenProvider: TokenProvider | undefined;
}

/** Opaque client handle. Only tool binding ever looks inside. */
export type ClientHandle = object;

export interface ClientConstructors {
  autogen(args: AutogenClientArgs): ClientHandle;
  langgraph(args: LangGraphClientArgs): ClientHandle;
  'openai-agents'(args: OpenAIAgentsClientArgs): OpenAI;
}

// ── SDK-backed constructors ──────────────────────────────────

export const defaultClientConstructors: ClientConstructors = {
  autogen: (args) => new AzureChatCompletionClient(args),

  // `name` selects the model here; LangChain's Python client treated it as the runnable name.
  langgraph: (args) =>
    new AzureChatOpenAI({
      model: args.name,
      temperature: args.temperature,
      azureOpenAIEndpoint: args.azureEndpoint,
      azureOpenAIApiVersion: args.apiVersion,
      azureOpenAIApiDeploymentName: args.azureDeployment,
      azureADTokenProvider: args.azureADTokenProvider,
    }),

  'openai-agents': (args) =>
    new AzureOpenAI({
      endpoint: args.azureEndpoint,
      apiVersion: args.apiVersion,
      azureADTokenProvider: args.azureADTokenProvider,
    }),
};

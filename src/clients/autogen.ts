import { AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import type { TokenProvider } from '../schema/index.js';

// ── Capabilities ─────────────────────────────────────────────

export interface ModelCapabilities {
  readonly functionCalling: boolean;
  readonly jsonOutput: boolean;
  readonly vision: boolean;
  readonly structuredOutput: boolean;
}

export const NO_CAPABILITIES: ModelCapabilities = Object.freeze({
  functionCalling: false,
  jsonOutput: false,
  vision: false,
  structuredOutput: false,
});

export const ALL_CAPABILITIES: ModelCapabilities = Object.freeze({
  functionCalling: true,
  jsonOutput: true,
  vision: true,
  structuredOutput: true,
});

// ── Constructor shape ────────────────────────────────────────

export interface AutogenClientArgs {
  model: string;
  azureEndpoint: string;
  apiVersion: string;
  azureDeployment: string;
  azureADTokenProvider: TokenProvider | undefined;
  temperature: number;
  modelCapabilities?: ModelCapabilities;
}

// ── Client ───────────────────────────────────────────────────

/**
 * Autogen-style chat completion client for an Azure OpenAI deployment.
 * Holds the model description agents inspect before deciding how to call it.
 */
export class AzureChatCompletionClient {
  readonly model: string;
  readonly deployment: string;
  readonly temperature: number;
  readonly capabilities: ModelCapabilities;

  private readonly client: AzureOpenAI;

  constructor(args: AutogenClientArgs) {
    this.model = args.model;
    this.deployment = args.azureDeployment;
    this.temperature = args.temperature;
    this.capabilities = args.modelCapabilities ?? NO_CAPABILITIES;
    this.client = new AzureOpenAI({
      endpoint: args.azureEndpoint,
      apiVersion: args.apiVersion,
      deployment: args.azureDeployment,
      azureADTokenProvider: args.azureADTokenProvider,
    });
  }

  async create(
    messages: ChatCompletionMessageParam[],
  ): Promise<ChatCompletion> {
    return this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: this.temperature,
    });
  }
}

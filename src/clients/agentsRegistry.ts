import {
  setDefaultOpenAIClient,
  setOpenAIAPI,
  setTracingDisabled,
} from '@openai/agents';
import type OpenAI from 'openai';

import { DEFAULTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Types ────────────────────────────────────────────────────

export type AgentsApi = 'chat_completions' | 'responses';

/** The process-wide setters of the OpenAI Agents SDK. */
export interface AgentsSdkHooks {
  setDefaultOpenAIClient(client: OpenAI): void;
  setOpenAIAPI(api: AgentsApi): void;
  setTracingDisabled(disabled: boolean): void;
}

export type ProcessEnvironment = Record<string, string | undefined>;

export const MIRRORED_ENV_KEYS = [
  'OPENAI_API_TYPE',
  'OPENAI_API_BASE',
  'OPENAI_API_VERSION',
] as const;

/** What the Agents SDK uses before anything is registered. */
const SDK_DEFAULT_API: AgentsApi = 'responses';

export type MirroredEnvKey = (typeof MIRRORED_ENV_KEYS)[number];

export interface AgentsRegistration {
  endpoint: string;
  apiVersion: string;
}

export interface AgentsDefaultsState {
  readonly client: OpenAI;
  readonly api: AgentsApi;
  readonly tracingDisabled: boolean;
  readonly env: Readonly<Record<MirroredEnvKey, string>>;
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Owns the "default client" selection of the OpenAI Agents SDK.
 *
 * Each `register` call replaces the previous selection: the last
 * configuration registered wins for every agent in the process. Hosts that
 * need several configurations side by side create one registry per
 * configuration with their own hooks and environment.
 */
export class AgentsDefaultsRegistry {
  private state: AgentsDefaultsState | undefined;

  constructor(
    private readonly hooks: AgentsSdkHooks,
    private readonly env: ProcessEnvironment = process.env,
  ) {}

  current(): AgentsDefaultsState | undefined {
    return this.state;
  }

  register(client: OpenAI, registration: AgentsRegistration): AgentsDefaultsState {
    const next: AgentsDefaultsState = Object.freeze({
      client,
      api: DEFAULTS.AGENTS_API,
      tracingDisabled: true,
      env: Object.freeze({
        OPENAI_API_TYPE: 'azure',
        OPENAI_API_BASE: registration.endpoint,
        OPENAI_API_VERSION: registration.apiVersion,
      }),
    });

    const previous = this.state;
    const previousEnv = this.snapshotEnv();

    try {
      this.apply(next);
    } catch (err) {
      this.rollback(previous, previousEnv);
      throw err;
    }

    if (previous !== undefined && previous.client !== client) {
      log.registry(
        `Replacing default OpenAI Agents client (${previous.env.OPENAI_API_BASE} → ${registration.endpoint})`,
      );
    }

    this.state = next;
    return next;
  }

  // ── Internals ──────────────────────────────────────────────

  /** The default client goes in last so a failed step never installs it. */
  private apply(state: AgentsDefaultsState): void {
    this.hooks.setOpenAIAPI(state.api);
    this.hooks.setTracingDisabled(state.tracingDisabled);

    for (const key of MIRRORED_ENV_KEYS) {
      this.env[key] = state.env[key];
    }

    this.hooks.setDefaultOpenAIClient(state.client);
  }

  private rollback(
    previous: AgentsDefaultsState | undefined,
    previousEnv: Record<MirroredEnvKey, string | undefined>,
  ): void {
    if (previous !== undefined) {
      this.apply(previous);
      return;
    }

    this.hooks.setOpenAIAPI(SDK_DEFAULT_API);
    this.hooks.setTracingDisabled(false);

    for (const key of MIRRORED_ENV_KEYS) {
      const value = previousEnv[key];
      if (value === undefined) {
        delete this.env[key];
      } else {
        this.env[key] = value;
      }
    }
  }

  private snapshotEnv(): Record<MirroredEnvKey, string | undefined> {
    return {
      OPENAI_API_TYPE: this.env['OPENAI_API_TYPE'],
      OPENAI_API_BASE: this.env['OPENAI_API_BASE'],
      OPENAI_API_VERSION: this.env['OPENAI_API_VERSION'],
    };
  }
}

// ── Process-wide registry ────────────────────────────────────

export const sdkAgentsHooks: AgentsSdkHooks = {
  setDefaultOpenAIClient,
  setOpenAIAPI,
  setTracingDisabled,
};

export const defaultAgentsRegistry = new AgentsDefaultsRegistry(sdkAgentsHooks);

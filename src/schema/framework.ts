import { z } from 'zod';

// ── Framework ────────────────────────────────────────────────

export const frameworkSchema = z.enum(['autogen', 'langgraph', 'openai-agents']);

export type Framework = z.infer<typeof frameworkSchema>;

export const FRAMEWORKS: readonly Framework[] = frameworkSchema.options;

export const FRAMEWORK_LABELS = {
  autogen: 'Autogen',
  langgraph: 'LangGraph',
  'openai-agents': 'OpenAI Agents',
} as const satisfies Record<Framework, string>;

export type FrameworkLabel = (typeof FRAMEWORK_LABELS)[Framework];

export function isFramework(value: string): value is Framework {
  return frameworkSchema.safeParse(value).success;
}

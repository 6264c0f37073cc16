import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { FRAMEWORKS, FRAMEWORK_LABELS, isFramework } from '../framework.js';
import { createModelConfig, resolvedModelConfigSchema } from '../modelConfig.js';

const fields = {
  endpoint: 'https://test-resource.openai.azure.com',
  deployment: 'gpt-4o-test',
  modelName: 'gpt-4o',
  apiVersion: '2024-10-21',
};

describe('createModelConfig', () => {
  it('defaults temperature to 0', () => {
    expect(createModelConfig(fields).temperature).toBe(0);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(createModelConfig(fields))).toBe(true);
  });

  it('accepts empty identifying fields', () => {
    expect(createModelConfig({ ...fields, deployment: '' }).deployment).toBe('');
  });

  it('rejects an out-of-range temperature', () => {
    expect(() => createModelConfig({ ...fields, temperature: 2.5 })).toThrow(ZodError);
  });
});

describe('resolvedModelConfigSchema', () => {
  it('requires every identifying field', () => {
    const config = createModelConfig({ ...fields, apiVersion: '' });

    const result = resolvedModelConfigSchema.safeParse(config);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual([
        'apiVersion',
      ]);
    }
  });
});

describe('frameworks', () => {
  it('lists the supported frameworks with labels', () => {
    expect(FRAMEWORKS).toEqual(['autogen', 'langgraph', 'openai-agents']);
    expect(FRAMEWORKS.map((framework) => FRAMEWORK_LABELS[framework])).toEqual([
      'Autogen',
      'LangGraph',
      'OpenAI Agents',
    ]);
  });

  it('recognises framework names case-sensitively', () => {
    expect(isFramework('langgraph')).toBe(true);
    expect(isFramework('LangGraph')).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../clients/errors.js';
import { DEFAULTS } from '../defaults.js';
import { loadEnvironment } from '../environment.js';
import { resolveSettings } from '../index.js';

describe('loadEnvironment', () => {
  it('reads model settings and the framework selector', () => {
    const environment = loadEnvironment({
      AZURE_ENDPOINT: 'https://test-resource.openai.azure.com',
      AZURE_DEPLOYMENT: 'gpt-4o-test',
      AZURE_MODEL_NAME: 'gpt-4o',
      AZURE_API_VERSION: '2024-10-21',
      AZURE_TEMPERATURE: '0.5',
      AZURE_TOKEN_SCOPE: 'api://test-scope/.default',
      FRAMEWORK: 'langgraph',
      EXP_TYPE: 'baseline',
    });

    expect(environment).toEqual({
      framework: 'langgraph',
      experimentType: 'baseline',
      tokenScope: 'api://test-scope/.default',
      model: {
        endpoint: 'https://test-resource.openai.azure.com',
        deployment: 'gpt-4o-test',
        modelName: 'gpt-4o',
        apiVersion: '2024-10-21',
        temperature: 0.5,
      },
    });
  });

  it('leaves missing fields empty and applies defaults', () => {
    expect(loadEnvironment({})).toEqual({
      framework: '',
      experimentType: undefined,
      tokenScope: DEFAULTS.TOKEN_SCOPE,
      model: {
        endpoint: '',
        deployment: '',
        modelName: '',
        apiVersion: '',
        temperature: 0,
      },
    });
  });

  it('treats a blank temperature as unset', () => {
    expect(loadEnvironment({ AZURE_TEMPERATURE: '' }).model.temperature).toBe(
      DEFAULTS.TEMPERATURE,
    );
    expect(loadEnvironment({ AZURE_TEMPERATURE: '   ' }).model.temperature).toBe(
      DEFAULTS.TEMPERATURE,
    );
  });

  it('rejects a non-numeric temperature', () => {
    expect(() => loadEnvironment({ AZURE_TEMPERATURE: 'warm' })).toThrow(ConfigError);
  });

  it('rejects a temperature above 2', () => {
    expect(() => loadEnvironment({ AZURE_TEMPERATURE: '3' })).toThrow(
      /^Invalid configuration in environment:/,
    );
  });
});

describe('resolveSettings', () => {
  const environment = loadEnvironment({
    AZURE_ENDPOINT: 'https://env-resource.openai.azure.com',
    AZURE_DEPLOYMENT: 'env-deployment',
    AZURE_MODEL_NAME: 'gpt-4o',
    AZURE_API_VERSION: '2024-10-21',
    FRAMEWORK: 'autogen',
  });

  it('returns the environment when there is no file', () => {
    expect(resolveSettings(environment)).toBe(environment);
  });

  it('lets file values override field by field', () => {
    const resolved = resolveSettings(environment, {
      framework: 'openai-agents',
      deployment: 'file-deployment',
      temperature: 0.7,
    });

    expect(resolved).toEqual({
      framework: 'openai-agents',
      experimentType: undefined,
      tokenScope: DEFAULTS.TOKEN_SCOPE,
      model: {
        endpoint: 'https://env-resource.openai.azure.com',
        deployment: 'file-deployment',
        modelName: 'gpt-4o',
        apiVersion: '2024-10-21',
        temperature: 0.7,
      },
    });
  });
});

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../../clients/errors.js';
import { loadConfigFile } from '../loader.js';

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'agent-clients-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses a YAML file', async () => {
    const file = path.join(dir, '.agent-clients.yaml');
    await writeFile(
      file,
      [
        'framework: langgraph',
        'endpoint: https://file-resource.openai.azure.com',
        'deployment: file-deployment',
        'temperature: 0.7',
        '',
      ].join('\n'),
      'utf-8',
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      framework: 'langgraph',
      endpoint: 'https://file-resource.openai.azure.com',
      deployment: 'file-deployment',
      temperature: 0.7,
    });
  });

  it('parses a JSON file', async () => {
    const file = path.join(dir, 'agent-clients.json');
    await writeFile(
      file,
      JSON.stringify({ modelName: 'gpt-4o', apiVersion: '2024-10-21' }),
      'utf-8',
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      modelName: 'gpt-4o',
      apiVersion: '2024-10-21',
    });
  });

  it('treats an empty YAML file as an empty config', async () => {
    const file = path.join(dir, 'empty.yaml');
    await writeFile(file, '', 'utf-8');

    await expect(loadConfigFile(file)).resolves.toEqual({});
  });

  it('rejects an unknown framework', async () => {
    const file = path.join(dir, 'bad.yaml');
    await writeFile(file, 'framework: crewai\n', 'utf-8');

    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects unknown keys', async () => {
    const file = path.join(dir, 'extra.yaml');
    await writeFile(file, 'apiKey: test-secret\n', 'utf-8');

    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a missing file', async () => {
    const file = path.join(dir, 'missing.yaml');

    await expect(loadConfigFile(file)).rejects.toThrow(
      `Invalid configuration in ${file}:`,
    );
  });
});

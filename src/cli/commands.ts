import { access } from 'node:fs/promises';

import type { Command } from 'commander';

import { createClient } from '../clients/index.js';
import { DEFAULTS, EXIT_CODES, loadConfigFile, loadEnvironment, resolveSettings } from '../config/index.js';
import type { Environment } from '../config/index.js';
import { createAzureTokenProvider } from '../credentials/index.js';
import { createModelConfig, FRAMEWORK_LABELS, isFramework } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Settings ─────────────────────────────────────────────────

async function defaultConfigPath(): Promise<string | undefined> {
  try {
    await access(DEFAULTS.CONFIG_PATH);
    return DEFAULTS.CONFIG_PATH;
  } catch {
    return undefined;
  }
}

/** Env first, then the config file; `.agent-clients.yaml` is picked up when present. */
async function loadSettings(configPath: string | undefined): Promise<Environment> {
  const environment = loadEnvironment();
  const resolvedPath = configPath ?? (await defaultConfigPath());
  const file = resolvedPath !== undefined ? await loadConfigFile(resolvedPath) : undefined;
  return resolveSettings(environment, file);
}

export function exitCodeOf(err: unknown): number {
  if (
    err instanceof Error &&
    'exitCode' in err &&
    typeof err.exitCode === 'number'
  ) {
    return err.exitCode;
  }
  return EXIT_CODES.FAILED;
}

function fail(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  log.error(message);
  process.exitCode = exitCodeOf(err);
}

// ── Inspect command ──────────────────────────────────────────

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Print the resolved framework and model settings')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: { config?: string; json?: true }) => {
      try {
        const settings = await loadSettings(opts.config);

        if (opts.json) {
          process.stdout.write(JSON.stringify(settings, null, 2) + '\n');
          return;
        }

        const label = isFramework(settings.framework)
          ? FRAMEWORK_LABELS[settings.framework]
          : settings.framework || '(unset)';

        log.section('Resolved settings');
        log.detail(`Framework:   ${label}`);
        log.detail(`Endpoint:    ${settings.model.endpoint || '(unset)'}`);
        log.detail(`Deployment:  ${settings.model.deployment || '(unset)'}`);
        log.detail(`Model:       ${settings.model.modelName || '(unset)'}`);
        log.detail(`API version: ${settings.model.apiVersion || '(unset)'}`);
        log.detail(`Temperature: ${String(settings.model.temperature)}`);
        log.detail(`Token scope: ${settings.tokenScope}`);
      } catch (err) {
        fail(err);
      }
    });
}

// ── Check command ────────────────────────────────────────────

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Build a client for the configured framework without calling the model')
    .option('--config <path>', 'Path to config file')
    .option('--framework <name>', 'Override the framework selector')
    .action(async (opts: { config?: string; framework?: string }) => {
      try {
        const settings = await loadSettings(opts.config);
        const framework = opts.framework ?? settings.framework;
        log.info(`Checking ${framework || '(unset)'} against ${settings.model.endpoint || '(unset)'}`);

        const config = createModelConfig({
          ...settings.model,
          tokenProvider: createAzureTokenProvider(settings.tokenScope),
        });
        const client = createClient(framework, config);

        log.ready(`${framework} client ready (${client.constructor.name})`);
        process.exitCode = EXIT_CODES.OK;
      } catch (err) {
        fail(err);
      }
    });
}

#!/usr/bin/env node

/**
 * agent-clients CLI entry point.
 * Thin wrapper — all logic delegated to the clients module.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerCheckCommand, registerInspectCommand } from './commands.js';

const program = new Command();

program
  .name('agent-clients')
  .description(
    'Build Azure OpenAI clients for Autogen, LangGraph and OpenAI Agents from one model config.',
  )
  .version('0.1.0');

registerInspectCommand(program);
registerCheckCommand(program);

await program.parseAsync();

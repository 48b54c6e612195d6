#!/usr/bin/env node

/**
 * actloop CLI
 *
 * Run the tool-using agent loop from the terminal.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { chatCommand } from './commands/chat.js';
import { toolsCommand } from './commands/tools.js';

const program = new Command();

program
  .name('actloop')
  .description('actloop CLI - think/act/observe agent loop with tool calling')
  .version('0.1.0');

// Run command
program
  .command('run')
  .description('Answer a single prompt and exit')
  .argument('<prompt>', 'User request')
  .option('-r, --max-rounds <n>', 'Round budget (default: ACTLOOP_MAX_ROUNDS or 5)')
  .option('--native', 'Send tools in the request and use structured tool calls')
  .option('--debug', 'Verbose logging')
  .action(runCommand);

// Chat command
program
  .command('chat')
  .description('Start an interactive chat session')
  .option('-r, --max-rounds <n>', 'Round budget per message')
  .option('--native', 'Send tools in the request and use structured tool calls')
  .option('--debug', 'Verbose logging')
  .action(chatCommand);

// Tools command
program
  .command('tools')
  .description('List the built-in tools')
  .action(toolsCommand);

// Parse and execute
await program.parseAsync();

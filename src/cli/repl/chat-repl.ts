/**
 * Chat REPL - calls the agent loop in-process.
 *
 * One AgentLoop backs the whole session, so earlier turns stay in context
 * until `/reset`.
 */

import * as readline from 'readline';
import type { AgentLoop } from '../../agent/agent-loop.js';
import { RunCancelledError } from '../../agent/errors.js';
import { paint, renderError, renderInfo, renderResult } from './display.js';

export interface ChatREPLConfig {
  agent: AgentLoop;
  toolNames: string[];
  model: string;
}

/**
 * Start the chat REPL.
 * Returns a promise that resolves when the user exits.
 */
export function startChatREPL(config: ChatREPLConfig): Promise<void> {
  const { agent, toolNames, model } = config;

  return new Promise<void>((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: paint('> ', 'bold'),
    });

    let controller: AbortController | null = null;

    console.log();
    console.log(`Chatting with ${paint(model, 'dim')}`);
    console.log(`Type your message or ${paint('/quit', 'dim')} to exit.`);
    console.log();

    rl.prompt();

    rl.on('line', async (line) => {
      const input = line.trim();

      if (!input) {
        rl.prompt();
        return;
      }

      // Handle commands
      if (input.startsWith('/')) {
        const [command] = input.slice(1).split(' ');
        switch (command.toLowerCase()) {
          case 'quit':
          case 'exit':
          case 'q':
            rl.close();
            return;
          case 'help':
          case 'h':
            console.log();
            console.log('Commands:');
            console.log('  /quit, /exit, /q  - Exit the chat');
            console.log('  /help, /h         - Show this help');
            console.log('  /reset            - Start a new conversation');
            console.log('  /tools            - List available tools');
            console.log();
            rl.prompt();
            return;
          case 'reset':
            agent.reset();
            console.log(renderInfo('Conversation cleared.'));
            rl.prompt();
            return;
          case 'tools':
            console.log(renderInfo(toolNames.length > 0 ? toolNames.join(', ') : 'No tools available'));
            rl.prompt();
            return;
          default:
            console.log(paint(`Unknown command: ${command}. Type /help for commands.`, 'dim'));
            rl.prompt();
            return;
        }
      }

      rl.pause();
      controller = new AbortController();
      console.log(paint('Thinking...', 'dim'));

      try {
        const result = await agent.execute(input, { signal: controller.signal });
        console.log();
        console.log(renderResult(result));
        console.log();
      } catch (err) {
        console.log(err instanceof RunCancelledError ? renderInfo('Cancelled.') : renderError(err));
      } finally {
        controller = null;
      }

      rl.resume();
      rl.prompt();
    });

    rl.on('close', () => {
      resolve();
    });

    // Ctrl+C cancels a running request, otherwise exits
    rl.on('SIGINT', () => {
      if (controller) {
        controller.abort();
      } else {
        rl.close();
      }
    });
  });
}

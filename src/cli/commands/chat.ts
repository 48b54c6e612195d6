/**
 * Chat command - interactive session over one conversation
 */

import { getConfig, validateConfig } from '../../config/index.js';
import { setLogLevel } from '../../shared/logger.js';
import { ToolRegistry } from '../../agent/tool-registry.js';
import { createBuiltinTools } from '../../agent/tools/index.js';
import { createAgent } from '../setup.js';
import { startChatREPL } from '../repl/chat-repl.js';
import { ConfigError } from '../../agent/errors.js';
import { renderError, renderRunEvent } from '../repl/display.js';
import { parseRounds } from './options.js';

export interface ChatCommandOptions {
  maxRounds?: string;
  native?: boolean;
  debug?: boolean;
}

export async function chatCommand(options: ChatCommandOptions): Promise<void> {
  const config = getConfig();
  // Round-by-round logs would interleave with the prompt
  setLogLevel(options.debug ? 'debug' : 'warn');

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    console.error(renderError(new ConfigError(errors)));
    process.exit(1);
  }

  try {
    const agent = createAgent(config, {
      maxRounds: parseRounds(options.maxRounds),
      nativeToolCalling: options.native,
      onEvent: (event) => {
        const line = renderRunEvent(event);
        if (line !== null) console.log(line);
      },
    });
    await startChatREPL({
      agent,
      toolNames: new ToolRegistry(createBuiltinTools()).names(),
      model: config.model,
    });
  } catch (err) {
    console.error(renderError(err));
    process.exit(1);
  }
}

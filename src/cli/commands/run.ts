/**
 * Run command - answer one prompt and exit
 */

import { getConfig, validateConfig } from '../../config/index.js';
import { setLogLevel } from '../../shared/logger.js';
import { createAgent } from '../setup.js';
import { ConfigError } from '../../agent/errors.js';
import { renderError, renderResult } from '../repl/display.js';
import { parseRounds } from './options.js';

export interface RunCommandOptions {
  maxRounds?: string;
  native?: boolean;
  debug?: boolean;
}

export async function runCommand(prompt: string, options: RunCommandOptions): Promise<void> {
  const config = getConfig();
  setLogLevel(options.debug ? 'debug' : config.logLevel);

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    console.error(renderError(new ConfigError(errors)));
    process.exit(1);
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const agent = createAgent(config, {
      maxRounds: parseRounds(options.maxRounds),
      nativeToolCalling: options.native,
    });
    const result = await agent.execute(prompt, { signal: controller.signal });
    console.log(renderResult(result));
  } catch (err) {
    console.error(renderError(err));
    process.exit(1);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

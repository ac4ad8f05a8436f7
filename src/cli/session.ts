import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { API_KEY_ENV, ConfigManager } from '../configManager.js';
import { NarratorAgent } from '../agents/NarratorAgent.js';
import type { AgentOptions } from '../agents/BaseAgent.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { printWarning } from './output.js';
import type { ConsoleLike } from './output.js';

const log = createLogger(NAMESPACES.cli);

export interface PromptIO {
  question(query: string): Promise<string>;
}

export interface SessionOptions {
  configManager?: ConfigManager;
  out?: ConsoleLike;
  agentOptions?: Omit<AgentOptions, 'configManager' | 'warn'>;
}

export function createTerminalIO(): PromptIO & { close(): void } {
  return readline.createInterface({ input: stdin, output: stdout });
}

/**
 * Ask once whether to enable narration. Anything other than 1 or 2 is asked
 * again.
 */
export async function askNarrationChoice(io: PromptIO, out: ConsoleLike = console): Promise<boolean> {
  out.log('\nEnable AI narration?');
  out.log('1. Enable narration');
  out.log('2. Play without narration');

  for (;;) {
    const answer = (await io.question('Enter choice (1-2): ')).trim();
    if (answer === '1') return true;
    if (answer === '2') return false;
    out.log('Please enter 1 or 2.');
  }
}

/**
 * Start-of-session setup: ask the player, resolve the credential, warn once
 * if it is missing, and build the narrator for the whole session.
 */
export async function startNarrationSession(
  io: PromptIO,
  options: SessionOptions = {}
): Promise<NarratorAgent> {
  const out = options.out ?? console;
  const configManager = options.configManager ?? new ConfigManager();
  const wantsNarration = await askNarrationChoice(io, out);
  const { config, warning } = configManager.resolveNarratorConfig(wantsNarration);

  if (warning) {
    printWarning(warning, out);
    out.warn(`Set ${API_KEY_ENV} in your .env file to enable narration.`);
  }
  log('Session narration %s', config.enabled ? 'on' : 'off');

  return new NarratorAgent(config, {
    ...options.agentOptions,
    configManager,
    warn: (message) => printWarning(message, out),
  });
}

#!/usr/bin/env node
import { ConfigManager } from '../configManager.js';
import { createTerminalIO, startNarrationSession } from './session.js';
import { runScriptedEncounter } from './encounter.js';

async function main(): Promise<void> {
  ConfigManager.loadEnvironment();
  const io = createTerminalIO();
  try {
    const narrator = await startNarrationSession(io);
    await runScriptedEncounter(narrator);
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

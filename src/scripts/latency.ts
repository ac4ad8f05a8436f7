/**
 * Time a single combat-start narration against the configured API.
 * The first call is often slower while the connection is set up.
 */
import { performance } from 'node:perf_hooks';
import { ConfigManager } from '../configManager.js';
import { NarratorAgent } from '../agents/NarratorAgent.js';
import { printNarration, printWarning } from '../cli/output.js';

async function main(): Promise<void> {
  ConfigManager.loadEnvironment();
  const configManager = new ConfigManager();
  const { config, warning } = configManager.resolveNarratorConfig(true);
  if (warning) printWarning(warning);

  const narrator = new NarratorAgent(config, { configManager, warn: (message) => printWarning(message) });

  console.log(`Testing narration response time (${config.model})...`);
  console.log('='.repeat(50));

  const start = performance.now();
  const narration = await narrator.narrateCombatStart({ name: 'Goblin', playerName: 'TestPlayer' });
  const elapsed = ((performance.now() - start) / 1000).toFixed(2);

  if (narration !== null) {
    printNarration(narration);
    console.log('='.repeat(50));
    console.log('API call successful!');
    console.log(`Response time: ${elapsed} seconds`);
  } else {
    console.log('API call failed or narration is disabled');
    console.log(`Time taken: ${elapsed} seconds`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});

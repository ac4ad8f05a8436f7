import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NarratorAgent } from '../agents/NarratorAgent.js';
import { GOBLIN_AMBUSH, runScriptedEncounter } from '../cli/encounter.js';
import type { ScriptedEncounter } from '../cli/encounter.js';
import { NARRATION_MARKER } from '../cli/output.js';
import { fakeOpenAIState, resetFakeOpenAI, replyWith, failWith } from './fixtures/fakeOpenAI.js';
import { defaultsOnly, DISABLED_CONFIG, ENABLED_CONFIG } from './fixtures/narrator.js';

vi.mock('openai', async () => {
  const { FakeOpenAI } = await import('./fixtures/fakeOpenAI.js');
  return { default: FakeOpenAI };
});

const OUTCOMES = [
  'A goblin appears!',
  'Aragorn chooses: Attack',
  'Aragorn misses Goblin!',
  'Goblin hits Aragorn for 3 damage!',
  'Aragorn chooses: Cast a spell',
  'Aragorn casts Magic Missile on Goblin, dealing 4 damage.',
  'Aragorn hits Goblin for 6 damage!',
  'Aragorn defeated the Goblin!',
];

function recordingConsole() {
  return { log: vi.fn<(message: string) => void>(), warn: vi.fn<(message: string) => void>() };
}

describe('runScriptedEncounter', () => {
  beforeEach(() => {
    resetFakeOpenAI();
  });

  it('plays through with outcome lines only when narration is off', async () => {
    const out = recordingConsole();
    const narrator = new NarratorAgent(DISABLED_CONFIG, { configManager: defaultsOnly() });

    await runScriptedEncounter(narrator, GOBLIN_AMBUSH, out);

    expect(out.log.mock.calls.map(([line]) => line)).toEqual(OUTCOMES);
    expect(fakeOpenAIState.calls).toHaveLength(0);
  });

  it('narrates each of the eight steps in order', async () => {
    const out = recordingConsole();
    fakeOpenAIState.respond = replyWith('Narrated.');
    const narrator = new NarratorAgent(ENABLED_CONFIG, { configManager: defaultsOnly() });

    await runScriptedEncounter(narrator, GOBLIN_AMBUSH, out);

    expect(out.log).toHaveBeenCalledTimes(16);
    expect(out.log.mock.calls[1]).toEqual([`\n${NARRATION_MARKER} Narrated.\n`]);
    expect(fakeOpenAIState.calls.map((call) => call.max_tokens)).toEqual([150, 50, 100, 100, 50, 100, 100, 100]);
    expect(fakeOpenAIState.calls[5].messages[1].content.split('\n')[0]).toBe(
      'Aragorn cast Magic Missile on Goblin, dealing 4 damage.'
    );
  });

  it('keeps going when every call fails', async () => {
    const out = recordingConsole();
    const warn = vi.fn();
    fakeOpenAIState.respond = failWith(new Error('Connection error.'));
    const narrator = new NarratorAgent(ENABLED_CONFIG, { configManager: defaultsOnly(), warn });

    await runScriptedEncounter(narrator, GOBLIN_AMBUSH, out);

    expect(out.log.mock.calls.map(([line]) => line)).toEqual(OUTCOMES);
    expect(warn).toHaveBeenCalledTimes(8);
  });

  it('narrates a defeat', async () => {
    const out = recordingConsole();
    fakeOpenAIState.respond = replyWith('Darkness takes you.');
    const narrator = new NarratorAgent(ENABLED_CONFIG, { configManager: defaultsOnly() });
    const lost: ScriptedEncounter = { player: 'Pippin', enemy: 'Troll', steps: [{ kind: 'defeat' }] };

    await runScriptedEncounter(narrator, lost, out);

    expect(out.log.mock.calls).toEqual([
      ['Pippin was defeated by the Troll.'],
      [`\n${NARRATION_MARKER} Darkness takes you.\n`],
    ]);
    expect(fakeOpenAIState.calls[0].messages[1].content.split('\n')[0]).toBe('Pippin has been defeated by the Troll.');
  });

  it('reports a hit without a damage roll as a landed blow', async () => {
    const out = recordingConsole();
    fakeOpenAIState.respond = replyWith('The blade bites deep.');
    const narrator = new NarratorAgent(ENABLED_CONFIG, { configManager: defaultsOnly() });
    const clash: ScriptedEncounter = {
      player: 'Boromir',
      enemy: 'Orc',
      steps: [{ kind: 'attack', attacker: 'Boromir', defender: 'Orc', weapon: 'sword', hit: true }],
    };

    await runScriptedEncounter(narrator, clash, out);

    expect(out.log.mock.calls[0]).toEqual(['Boromir hits Orc!']);
    expect(fakeOpenAIState.calls[0].messages[1].content.split('\n')[0]).toBe(
      'Boromir attacked Orc with a sword and landed the blow.'
    );
  });
});

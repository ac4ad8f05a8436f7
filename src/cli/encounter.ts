import type { NarratorAgent } from '../agents/NarratorAgent.js';
import type { NarrationResult } from '../types/Narration.js';
import { describeSpellEffect } from '../utils/narrationHelpers.js';
import { printNarration } from './output.js';
import type { ConsoleLike } from './output.js';

/**
 * A pre-resolved encounter, standing in for the host game's combat loop.
 * Each step carries an outcome the host already computed.
 */
export type EncounterStep =
  | { kind: 'start'; enemy: string; description?: string }
  | { kind: 'choice'; actions: string[]; chosen: string }
  | { kind: 'attack'; attacker: string; defender: string; weapon: string; hit: boolean; damage?: number }
  | { kind: 'spell'; caster: string; target: string; spell: string; amount: number }
  | { kind: 'victory' }
  | { kind: 'defeat' };

export interface ScriptedEncounter {
  player: string;
  enemy: string;
  steps: EncounterStep[];
}

export const GOBLIN_AMBUSH: ScriptedEncounter = {
  player: 'Aragorn',
  enemy: 'Goblin',
  steps: [
    { kind: 'start', enemy: 'Goblin', description: 'a wiry goblin with a rusted scimitar, crouched behind a cart' },
    { kind: 'choice', actions: ['Attack', 'Cast a spell', 'Run away'], chosen: 'Attack' },
    { kind: 'attack', attacker: 'Aragorn', defender: 'Goblin', weapon: 'longsword', hit: false },
    { kind: 'attack', attacker: 'Goblin', defender: 'Aragorn', weapon: 'scimitar', hit: true, damage: 3 },
    { kind: 'choice', actions: ['Attack', 'Cast a spell', 'Run away'], chosen: 'Cast a spell' },
    { kind: 'spell', caster: 'Aragorn', target: 'Goblin', spell: 'Magic Missile', amount: 4 },
    { kind: 'attack', attacker: 'Aragorn', defender: 'Goblin', weapon: 'longsword', hit: true, damage: 6 },
    { kind: 'victory' },
  ],
};

function outcomeLine(step: EncounterStep, encounter: ScriptedEncounter): string {
  switch (step.kind) {
    case 'start':
      return `A ${step.enemy.toLowerCase()} appears!`;
    case 'choice':
      return `${encounter.player} chooses: ${step.chosen}`;
    case 'attack':
      if (!step.hit) return `${step.attacker} misses ${step.defender}!`;
      return step.damage === undefined
        ? `${step.attacker} hits ${step.defender}!`
        : `${step.attacker} hits ${step.defender} for ${step.damage} damage!`;
    case 'spell':
      return `${step.caster} casts ${step.spell} on ${step.target}, ${describeSpellEffect(step.amount)}.`;
    case 'victory':
      return `${encounter.player} defeated the ${encounter.enemy}!`;
    case 'defeat':
      return `${encounter.player} was defeated by the ${encounter.enemy}.`;
  }
}

function narrateStep(narrator: NarratorAgent, step: EncounterStep, encounter: ScriptedEncounter): Promise<NarrationResult> {
  switch (step.kind) {
    case 'start':
      return narrator.narrateCombatStart({ name: step.enemy, description: step.description, playerName: encounter.player });
    case 'choice':
      return narrator.narrateActionChoice(encounter.player, step.actions);
    case 'attack':
      return narrator.narrateAttack(step.attacker, step.defender, step.weapon, step.hit, step.damage);
    case 'spell':
      return narrator.narrateSpellCast(step.caster, step.spell, step.target, describeSpellEffect(step.amount));
    case 'victory':
      return narrator.narrateVictory(encounter.player, encounter.enemy);
    case 'defeat':
      return narrator.narrateDefeat(encounter.player, encounter.enemy);
  }
}

/** Replay the encounter in order, printing each outcome and any narration. */
export async function runScriptedEncounter(
  narrator: NarratorAgent,
  encounter: ScriptedEncounter = GOBLIN_AMBUSH,
  out: ConsoleLike = console
): Promise<void> {
  for (const step of encounter.steps) {
    out.log(outcomeLine(step, encounter));
    printNarration(await narrateStep(narrator, step, encounter), out);
  }
}

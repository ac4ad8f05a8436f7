import { BaseAgent } from './BaseAgent.js';
import type { AgentOptions } from './BaseAgent.js';
import type { NarratorConfig } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { formatActionList } from '../utils/narrationHelpers.js';
import type {
  AttackRequest,
  Encounter,
  NarrationResult,
  OutcomeRequest,
  SpellCastRequest,
} from '../types/Narration.js';

const log = createLogger(NAMESPACES.agents.narrator);

/**
 * Combat narration facade. Every method resolves to text or null and never
 * rejects; a disabled narrator resolves null without touching the network.
 */
export class NarratorAgent extends BaseAgent {
  constructor(config: NarratorConfig, options: AgentOptions = {}) {
    super('narrator', config, options);
    log('Narrator %s (model %s)', this.enabled ? 'enabled' : 'disabled', config.model);
  }

  narrateCombatStart(encounter: Encounter): Promise<NarrationResult> {
    return this.narrate('combat-start', encounter);
  }

  narrateActionChoice(actorName: string, availableActions: string[]): Promise<NarrationResult> {
    return this.narrate('action-choice', { actorName, availableActions }, { actionList: formatActionList(availableActions) });
  }

  narrateAttack(
    actorName: string,
    targetName: string,
    weaponName: string,
    hit: boolean,
    damage?: number
  ): Promise<NarrationResult> {
    const request: AttackRequest = { actorName, targetName, weaponName, hit, damage };
    return this.narrate('attack', request);
  }

  narrateSpellCast(
    actorName: string,
    spellName: string,
    targetName: string,
    effectDescription: string
  ): Promise<NarrationResult> {
    const request: SpellCastRequest = { actorName, spellName, targetName, effectDescription };
    return this.narrate('spell-cast', request);
  }

  narrateVictory(actorName: string, opponentName?: string): Promise<NarrationResult> {
    const request: OutcomeRequest = { actorName, opponentName };
    return this.narrate('victory', request);
  }

  narrateDefeat(actorName: string, opponentName?: string): Promise<NarrationResult> {
    const request: OutcomeRequest = { actorName, opponentName };
    return this.narrate('defeat', request);
  }
}

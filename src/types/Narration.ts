export type NarrationEvent =
  | 'combat-start'
  | 'action-choice'
  | 'attack'
  | 'spell-cast'
  | 'victory'
  | 'defeat';

export const NARRATION_EVENTS: readonly NarrationEvent[] = [
  'combat-start',
  'action-choice',
  'attack',
  'spell-cast',
  'victory',
  'defeat'
];

/** Text to print, or null when there is nothing to narrate. */
export type NarrationResult = string | null;

export interface Encounter {
  /** The opposing creature, e.g. "Goblin". */
  name: string;
  description?: string;
  playerName?: string;
}

export interface ActionChoiceRequest {
  actorName: string;
  availableActions: string[];
}

export interface AttackRequest {
  actorName: string;
  targetName: string;
  weaponName: string;
  hit: boolean;
  damage?: number;
}

export interface SpellCastRequest {
  actorName: string;
  spellName: string;
  targetName: string;
  effectDescription: string;
}

export interface OutcomeRequest {
  actorName: string;
  opponentName?: string;
}

export interface NarrationRequests {
  'combat-start': Encounter;
  'action-choice': ActionChoiceRequest;
  attack: AttackRequest;
  'spell-cast': SpellCastRequest;
  victory: OutcomeRequest;
  defeat: OutcomeRequest;
}

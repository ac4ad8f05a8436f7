export { NarratorAgent } from './agents/NarratorAgent.js';
export { createPromptEnvironment, PROMPTS_DIR } from './agents/BaseAgent.js';
export type { AgentOptions, WarningSink } from './agents/BaseAgent.js';
export {
  ConfigManager,
  ConfigError,
  DEFAULT_MODEL,
  API_KEY_ENV,
  PLACEHOLDER_API_KEYS,
  isUsableApiKey,
} from './configManager.js';
export type { NarratorConfig, NarratorSettings, SamplerSettings, ResolvedNarratorConfig } from './configManager.js';
export { formatActionList, describeSpellEffect } from './utils/narrationHelpers.js';
export { askNarrationChoice, startNarrationSession, createTerminalIO } from './cli/session.js';
export type { PromptIO, SessionOptions } from './cli/session.js';
export { printNarration, printWarning } from './cli/output.js';
export { NARRATION_EVENTS } from './types/Narration.js';
export type {
  NarrationEvent,
  NarrationResult,
  NarrationRequests,
  Encounter,
  ActionChoiceRequest,
  AttackRequest,
  SpellCastRequest,
  OutcomeRequest,
} from './types/Narration.js';

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { Ajv } from 'ajv';
import { config as loadDotenv } from 'dotenv';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
import { NARRATION_EVENTS } from './types/Narration.js';
import type { NarrationEvent } from './types/Narration.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger(NAMESPACES.config);

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const API_KEY_ENV = 'OPENAI_API_KEY';
export const PLACEHOLDER_API_KEYS: readonly string[] = ['your_api_key_here'];
export const DEFAULT_SETTINGS_PATH = path.join(__dirname, '..', 'config', 'narrator.json');

export interface SamplerSettings {
  temperature?: number;
  max_completion_tokens?: number;
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface NarratorSettings {
  model?: string;
  sampler?: SamplerSettings;
  events?: Partial<Record<NarrationEvent, SamplerSettings>>;
  debug?: DebugSettings;
}

export interface NarratorConfig {
  readonly enabled: boolean;
  readonly model: string;
  readonly apiKey?: string;
  readonly baseURL?: string;
}

export interface ResolvedNarratorConfig {
  config: NarratorConfig;
  /** Set when narration was requested but no usable credential exists. */
  warning?: string;
}

export type Env = Record<string, string | undefined>;

const EVENT_SAMPLER_DEFAULTS: Record<NarrationEvent, Required<SamplerSettings>> = {
  'combat-start': { max_completion_tokens: 150, temperature: 0.8 },
  'action-choice': { max_completion_tokens: 50, temperature: 0.7 },
  attack: { max_completion_tokens: 100, temperature: 0.8 },
  'spell-cast': { max_completion_tokens: 100, temperature: 0.8 },
  victory: { max_completion_tokens: 100, temperature: 0.8 },
  defeat: { max_completion_tokens: 100, temperature: 0.8 }
};

export class ConfigError extends Error {
  constructor(message: string, readonly configPath: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isUsableApiKey(apiKey: string | undefined): apiKey is string {
  if (!apiKey) return false;
  const trimmed = apiKey.trim();
  return trimmed !== '' && !PLACEHOLDER_API_KEYS.includes(trimmed);
}

const samplerSchema = {
  type: 'object',
  properties: {
    temperature: { type: 'number', minimum: 0 },
    max_completion_tokens: { type: 'integer', minimum: 1 }
  },
  additionalProperties: false
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSettings = ajv.compile<NarratorSettings>({
  type: 'object',
  properties: {
    model: { type: 'string', minLength: 1 },
    sampler: samplerSchema,
    events: {
      type: 'object',
      properties: Object.fromEntries(NARRATION_EVENTS.map((event) => [event, samplerSchema])),
      additionalProperties: false
    },
    debug: {
      type: 'object',
      properties: { enabledNamespaces: { type: 'string' } }
    }
  }
});

export class ConfigManager {
  private readonly settings: NarratorSettings;
  private readonly env: Env;

  constructor(settingsPath: string = DEFAULT_SETTINGS_PATH, env: Env = process.env) {
    this.env = env;
    this.settings = this.loadSettings(settingsPath);
    enableNamespaces(this.settings.debug?.enabledNamespaces);
  }

  /** Populate process.env from a .env file in the working directory, if present. */
  static loadEnvironment(): void {
    loadDotenv();
  }

  private loadSettings(settingsPath: string): NarratorSettings {
    if (!fs.existsSync(settingsPath)) {
      log('No settings file at %s, using defaults', settingsPath);
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid narrator settings in ${settingsPath}: ${reason}`, settingsPath);
    }
    if (!validateSettings(parsed)) {
      const errors = (validateSettings.errors || []).map((err) => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
      throw new ConfigError(`Invalid narrator settings in ${settingsPath}: ${errors.join('; ')}`, settingsPath);
    }
    log('Loaded settings from %s', settingsPath);
    return parsed;
  }

  getModel(): string {
    const fromEnv = this.env.NARRATOR_MODEL?.trim();
    return fromEnv || this.settings.model?.trim() || DEFAULT_MODEL;
  }

  getSampler(event: NarrationEvent): Required<SamplerSettings> {
    return {
      ...EVENT_SAMPLER_DEFAULTS[event],
      ...this.settings.sampler,
      ...this.settings.events?.[event]
    };
  }

  /**
   * Build the session's NarratorConfig from the player's answer and the
   * credential in the environment.
   */
  resolveNarratorConfig(wantsNarration: boolean): ResolvedNarratorConfig {
    const model = this.getModel();
    const baseURL = this.env.OPENAI_BASE_URL?.trim() || undefined;
    if (!wantsNarration) {
      return { config: Object.freeze({ enabled: false, model }) };
    }

    const apiKey = this.env[API_KEY_ENV];
    if (!isUsableApiKey(apiKey)) {
      log('Credential %s missing or placeholder, narration disabled', API_KEY_ENV);
      return {
        config: Object.freeze({ enabled: false, model }),
        warning: 'API key not configured. Narration disabled.'
      };
    }

    return {
      config: Object.freeze({ enabled: true, model, apiKey: apiKey.trim(), baseURL })
    };
  }
}

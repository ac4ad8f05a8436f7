import * as nunjucks from 'nunjucks';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type OpenAI from 'openai';
import { chatCompletion, createClient, describeError } from '../llm/client.js';
import type { ChatMessage } from '../llm/client.js';
import { ConfigManager, isUsableApiKey } from '../configManager.js';
import type { NarratorConfig, SamplerSettings } from '../configManager.js';
import { countTokens, estimateWordsFromTokens } from '../utils/tokenCounter.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { printWarning } from '../cli/output.js';
import type { NarrationEvent, NarrationRequests, NarrationResult } from '../types/Narration.js';

export const PROMPTS_DIR = path.join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'prompts');

export type WarningSink = (message: string) => void;

export interface AgentOptions {
  /** Pre-built API client; one is created from the config otherwise. */
  client?: OpenAI;
  /** Reads the sampler settings per event; defaults to the bundled settings file. */
  configManager?: ConfigManager;
  env?: nunjucks.Environment;
  /** Where per-call failure warnings go. Defaults to printWarning on the console. */
  warn?: WarningSink;
}

export function createPromptEnvironment(promptsDir: string = PROMPTS_DIR): nunjucks.Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(promptsDir), { autoescape: false });
  env.addGlobal('estimateWordsFromTokens', estimateWordsFromTokens);
  return env;
}

export abstract class BaseAgent {
  protected readonly config: NarratorConfig;
  protected readonly configManager: ConfigManager;
  protected readonly env: nunjucks.Environment;
  protected readonly agentName: string;
  private readonly client: OpenAI | null;
  private readonly warn: WarningSink;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, config: NarratorConfig, options: AgentOptions = {}) {
    this.agentName = agentName;
    this.config = config;
    this.configManager = options.configManager ?? new ConfigManager();
    this.env = options.env ?? createPromptEnvironment();
    this.warn = options.warn ?? ((message) => printWarning(message));

    if (config.enabled && isUsableApiKey(config.apiKey)) {
      this.client = options.client ?? createClient({ apiKey: config.apiKey.trim(), baseURL: config.baseURL });
    } else {
      this.client = null;
    }
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  protected renderTemplate(templateName: string, context: object): string {
    const result = this.env.render(`${templateName}.njk`, context).trim();
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s (%d tokens): %s', templateName, countTokens(result), preview);
    return result;
  }

  protected buildMessages(event: NarrationEvent, context: object, sampler: SamplerSettings): ChatMessage[] {
    return [
      { role: 'system', content: this.renderTemplate('system', { maxTokens: sampler.max_completion_tokens }) },
      { role: 'user', content: this.renderTemplate(event, context) },
    ];
  }

  /**
   * Render the event's prompt and make the single API call. Failures become
   * a warning line and a null result; empty completions are also null.
   */
  protected async narrate<E extends NarrationEvent>(
    event: E,
    request: NarrationRequests[E],
    extras: object = {}
  ): Promise<NarrationResult> {
    if (!this.client) return null;

    try {
      const sampler = this.configManager.getSampler(event);
      const messages = this.buildMessages(event, { ...request, ...extras }, sampler);
      const raw = await chatCompletion(this.client, { model: this.config.model, messages, sampler });
      const text = raw.trim();
      if (text === '') {
        this.baseAgentLog('[LLM] Empty completion for %s/%s', this.agentName, event);
        return null;
      }
      return text;
    } catch (error: unknown) {
      const details = describeError(error);
      this.baseAgentLog('[LLM] Call failed for agent %s event %s: %o', this.agentName, event, details);
      this.warn(`Narration error: ${details.error.replace(/\s+/g, ' ').trim()}`);
      return null;
    }
  }
}

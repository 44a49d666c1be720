// src/agent/index.ts
import type { LocalePack } from '../locales/types.js';
import type { CompletionClient } from '../services/llm.js';
import type { DialogueMemory } from '../services/memory.js';
import type { IntentRouter, RouteDecision } from '../router/index.js';
import type { WeatherInvoker } from '../tools/types.js';
import { hasOutdoorCue } from '../router/location.js';
import { buildDirectPrompt } from './prompts.js';
import { formatReport, formatSuitability } from './compose.js';
import { debug, info, warn, error } from '../utils/logger.js';

export interface AgentDeps {
  locale: LocalePack;
  llm: CompletionClient;
  router: Pick<IntentRouter, 'decide'>;
  weather: WeatherInvoker;
  memory: DialogueMemory;
}

/**
 * Runs one conversational turn at a time: record, route, answer, record.
 */
export class Agent {
  private pack: LocalePack;
  private llm: CompletionClient;
  private router: Pick<IntentRouter, 'decide'>;
  private weather: WeatherInvoker;
  private memory: DialogueMemory;
  private busy = false;

  constructor(deps: AgentDeps) {
    this.pack = deps.locale;
    this.llm = deps.llm;
    this.router = deps.router;
    this.weather = deps.weather;
    this.memory = deps.memory;
  }

  async processQuery(utterance: string): Promise<string> {
    if (this.busy) {
      warn('Turn rejected, previous turn still running');
      return this.pack.messages.turnFailure;
    }

    this.busy = true;
    try {
      this.memory.record('user', utterance);

      let reply: string;
      try {
        const decision = await this.router.decide(utterance, this.memory);
        debug('Route decision', { source: decision.source, city: decision.city });
        reply = await this.answer(utterance, decision);
      } catch (err) {
        error('Turn failed', { error: String(err) });
        reply = this.pack.messages.turnFailure;
      }

      this.memory.record('assistant', reply);
      return reply;
    } finally {
      this.busy = false;
    }
  }

  reset(): void {
    this.memory.clear();
    info('Dialogue memory cleared');
  }

  // === Paths ===

  private async answer(utterance: string, decision: RouteDecision): Promise<string> {
    if (!decision.shouldCallTool) {
      return this.answerDirectly(utterance);
    }

    const result = await this.weather.invoke(decision.city);
    if (result.kind === 'error') {
      warn('Weather lookup failed', { city: decision.city, reason: result.reason });
      return this.pack.messages.toolFailure(decision.city);
    }

    return hasOutdoorCue(utterance, this.pack)
      ? formatSuitability(result, this.pack)
      : formatReport(result, this.pack);
  }

  private async answerDirectly(utterance: string): Promise<string> {
    // Context already ends with the utterance recorded above
    const prompt = buildDirectPrompt(this.pack, this.memory.renderContext(), utterance);

    try {
      return await this.llm.chat([{ role: 'system', content: prompt }]);
    } catch (err) {
      warn('Direct answer failed', { error: String(err) });
      return this.pack.messages.directFailure;
    }
  }
}

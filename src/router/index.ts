// src/router/index.ts
import type { CompletionClient } from '../services/llm.js';
import type { DialogueMemory } from '../services/memory.js';
import type { LocalePack } from '../locales/types.js';
import { buildClassifierPrompt } from '../agent/prompts.js';
import { extractLocation, isWeatherQuery } from './location.js';
import { debug, warn } from '../utils/logger.js';

export type RouteSource = 'keyword' | 'classifier' | 'classifier-error';

export type RouteDecision =
  | { shouldCallTool: true; city: string; source: RouteSource }
  | { shouldCallTool: false; city: null; source: RouteSource };

export interface IntentRouterOptions {
  /** Output budget for the classification call */
  classifierMaxTokens?: number;
}

function toolRoute(city: string, source: RouteSource): RouteDecision {
  return { shouldCallTool: true, city, source };
}

function directRoute(source: RouteSource): RouteDecision {
  return { shouldCallTool: false, city: null, source };
}

export class IntentRouter {
  private llm: CompletionClient;
  private pack: LocalePack;
  private classifierMaxTokens: number;

  constructor(llm: CompletionClient, pack: LocalePack, options: IntentRouterOptions = {}) {
    this.llm = llm;
    this.pack = pack;
    this.classifierMaxTokens = options.classifierMaxTokens ?? 50;
  }

  /**
   * Decide whether an utterance needs the weather tool, and for which city.
   *
   * Flow:
   * 1. Keyword screen; on a hit, try the deterministic location extractor
   * 2. Otherwise (or when no location was found) ask the model to classify
   * 3. Any classifier failure means no tool call
   */
  async decide(utterance: string, memory: DialogueMemory): Promise<RouteDecision> {
    if (isWeatherQuery(utterance, this.pack)) {
      const location = extractLocation(utterance, this.pack);
      if (location.resolvedCity) {
        debug('Route: keyword match', { city: location.resolvedCity, tier: location.tier });
        return toolRoute(location.resolvedCity, 'keyword');
      }
      debug('Route: weather keywords but no location, asking classifier');
    }

    return this.classify(utterance, memory);
  }

  private async classify(utterance: string, memory: DialogueMemory): Promise<RouteDecision> {
    let decision: string;
    try {
      decision = await this.llm.chat(
        [
          { role: 'system', content: buildClassifierPrompt(this.pack, memory.renderContext()) },
          { role: 'user', content: utterance },
        ],
        { temperature: 0, maxTokens: this.classifierMaxTokens }
      );
    } catch (err) {
      warn('Intent classification failed, not calling tool', { error: String(err) });
      return directRoute('classifier-error');
    }

    debug('Classifier decision', { decision });
    return this.interpret(decision, utterance);
  }

  // TODO: ask the classifier for a constrained token; substring markers misfire on words like "now"
  private interpret(decision: string, utterance: string): RouteDecision {
    const lower = decision.toLowerCase();
    if (this.pack.negativeMarkers.some((marker) => lower.includes(marker))) {
      return directRoute('classifier');
    }

    const labelled = decision.match(this.pack.cityLabel)?.[1]?.trim();
    if (labelled) {
      return toolRoute(labelled, 'classifier');
    }

    const location = extractLocation(utterance, this.pack);
    return location.resolvedCity
      ? toolRoute(location.resolvedCity, 'classifier')
      : directRoute('classifier');
  }
}

// src/services/llm.ts
import OpenAI from 'openai';
import type { Config } from '../config.js';
import { cleanModelOutput } from '../utils/llm.js';
import { info, warn, debug } from '../utils/logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * The completion capability the router and the agent depend on.
 * Resolves with the cleaned reply text; rejects on transport failure or timeout.
 * No tool schemas are offered to the model, so replies are always text.
 */
export interface CompletionClient {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

function toParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class LLMService implements CompletionClient {
  private config: Config;
  private client: OpenAI;
  private healthy = false;

  constructor(config: Config) {
    this.config = config;

    // Timeouts are enforced here; the core never retries.
    this.client = new OpenAI({
      baseURL: config.llm.url,
      apiKey: config.llm.apiKey,
      timeout: config.llm.timeout,
      maxRetries: 0,
    });
  }

  async initialize(): Promise<void> {
    await this.checkHealth();
    info('LLMService initialized', { model: this.config.llm.model, healthy: this.healthy });
  }

  private async checkHealth(): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.llm.healthTimeout);

    try {
      const response = await fetch(`${this.config.llm.url}/models`, {
        signal: controller.signal,
        headers: { Authorization: `Bearer ${this.config.llm.apiKey}` },
      });
      this.healthy = response.ok;
      debug('LLM health check', { ok: response.ok, status: response.status });
    } catch (err) {
      warn('LLM health check failed', { url: this.config.llm.url, error: String(err) });
      this.healthy = false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const maxTokens = options.maxTokens ?? this.config.llm.maxTokens;

    debug('LLM chat', { model: this.config.llm.model, maxTokens, temperature: options.temperature });

    const response = await this.client.chat.completions.create({
      model: this.config.llm.model,
      messages: messages.map(toParam),
      max_tokens: maxTokens,
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      stream: false,
    });

    return cleanModelOutput(response.choices[0]?.message?.content ?? '');
  }
}

import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('llm');

export interface LLMCompletionResult {
  content: string;
  model: string;
  usage?: { promptTokens: number; completionTokens: number };
}

/**
 * Inference and embedding collaborator. Treated as a black box by the
 * workflow; determinism is whatever the backend guarantees.
 */
export interface LLMProvider {
  name: string;
  initialize(): Promise<void>;
  dispose(): Promise<void>;
  complete(systemPrompt: string, userPrompt: string): Promise<LLMCompletionResult>;
  embed(text: string): Promise<number[]>;
}

export class LLMService {
  private initialized = false;

  constructor(private readonly provider: LLMProvider) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;
    log.info('Initializing LLM provider', { provider: this.provider.name });
    const start = Date.now();
    await this.provider.initialize();
    this.initialized = true;
    log.info('LLM provider initialized', { provider: this.provider.name, durationMs: Date.now() - start });
  }

  async dispose(): Promise<void> {
    if (!this.initialized) return;
    await this.provider.dispose();
    this.initialized = false;
    log.info('LLM provider disposed', { provider: this.provider.name });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LLMCompletionResult> {
    log.debug('LLM completion request', {
      provider: this.provider.name,
      systemPromptLength: systemPrompt.length,
      userPromptLength: userPrompt.length,
    });
    const start = Date.now();
    try {
      const result = await this.provider.complete(systemPrompt, userPrompt);
      log.info('LLM completion complete', {
        provider: this.provider.name,
        model: result.model,
        contentLength: result.content.length,
        usage: result.usage,
        durationMs: Date.now() - start,
      });
      return result;
    } catch (error) {
      log.error('LLM completion failed', {
        provider: this.provider.name,
        error: errorMessage(error),
        durationMs: Date.now() - start,
      });
      throw error;
    }
  }

  async embed(text: string): Promise<number[]> {
    const start = Date.now();
    try {
      const vector = await this.provider.embed(text);
      log.debug('Embedding computed', { provider: this.provider.name, dimensions: vector.length, durationMs: Date.now() - start });
      return vector;
    } catch (error) {
      log.error('Embedding failed', { provider: this.provider.name, error: errorMessage(error) });
      throw error;
    }
  }
}

/** Pulls a JSON value out of a completion, tolerating markdown code fences. */
export function tryParseJSON(text: string): unknown {
  const fenceMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonStr = fenceMatch ? fenceMatch[1].trim() : text.trim();
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}

/** The slices of LLMService the nodes depend on. */
export type Completer = Pick<LLMService, 'complete'>;
export type Embedder = Pick<LLMService, 'embed'>;

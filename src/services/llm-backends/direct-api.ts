import { z } from 'zod';
import type { LLMProvider, LLMCompletionResult } from '../llm-provider.js';
import type { LLMConfig } from '../../config.js';
import { ConfigurationError, RetryableToolError } from '../../errors.js';
import { createLogger } from '../../logger.js';

const log = createLogger('llm:direct-api');

const ChatCompletionResponse = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
  model: z.string(),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

const EmbeddingResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

/** OpenAI-compatible chat completions and embeddings over plain HTTP. */
export class DirectAPILLMProvider implements LLMProvider {
  public readonly name = 'direct-api';

  constructor(private readonly config: LLMConfig) {}

  async initialize(): Promise<void> {
    if (!this.config.apiKey) {
      throw new ConfigurationError('LLM_API_KEY is required for the direct API backend');
    }
    log.info('Direct API provider ready', {
      baseUrl: this.config.baseUrl,
      model: this.config.model,
      embeddingModel: this.config.embeddingModel,
    });
  }

  async dispose(): Promise<void> {
    // Stateless HTTP
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LLMCompletionResult> {
    const data = ChatCompletionResponse.parse(
      await this.post('/chat/completions', {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      }),
    );

    if (data.choices.length === 0) {
      throw new RetryableToolError('LLM API returned no choices');
    }

    return {
      content: data.choices[0].message.content ?? '',
      model: data.model,
      usage: data.usage
        ? { promptTokens: data.usage.prompt_tokens, completionTokens: data.usage.completion_tokens }
        : undefined,
    };
  }

  async embed(text: string): Promise<number[]> {
    const data = EmbeddingResponse.parse(
      await this.post('/embeddings', { model: this.config.embeddingModel, input: text }),
    );
    return data.data[0].embedding;
  }

  private async post(route: string, body: unknown): Promise<unknown> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${route}`;
    log.debug('POST', { url });

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      const message = `LLM API error ${response.status}: ${errorText}`;
      if (response.status === 429 || response.status >= 500) {
        throw new RetryableToolError(message);
      }
      throw new Error(message);
    }
    return response.json();
  }
}

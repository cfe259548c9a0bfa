import Anthropic from '@anthropic-ai/sdk';
import {
  LLMProvider,
  LLMProviderConfig,
  ChunkContext,
  OverviewContext,
  CallOptions,
  buildChunkPrompt,
  buildOverviewPrompt,
} from './types';
import { normalizeBulletPoints, splitPoints } from './bulletPoints';
import { backoff } from './retry';
import { SummarizationError, describeError } from '../errors';

export class AnthropicLLMProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private maxAttempts: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'anthropic') {
      throw new Error('Invalid config type for AnthropicLLMProvider');
    }

    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.model = config.model ?? 'claude-3-5-haiku-latest';
    this.maxTokens = config.maxTokens ?? 500;
    this.maxAttempts = config.maxAttempts ?? 1;
  }

  async testConnection(): Promise<boolean> {
    try {
      // Simple test message
      await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async summarizeChunk(text: string, context: ChunkContext, options: CallOptions = {}): Promise<string> {
    const response = await this.callWithRetry(buildChunkPrompt(text, context), options.signal);
    const summary = normalizeBulletPoints(response);
    if (!summary) {
      throw new SummarizationError('Anthropic returned no bullet points');
    }
    return summary;
  }

  async summarizeOverview(
    text: string,
    context: OverviewContext,
    options: CallOptions = {}
  ): Promise<string[]> {
    const response = await this.callWithRetry(buildOverviewPrompt(text, context), options.signal);
    const points = splitPoints(response);
    if (points.length === 0) {
      throw new SummarizationError('Anthropic returned no points');
    }
    return points;
  }

  private async callWithRetry(prompt: string, signal?: AbortSignal): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.client.messages.create(
          {
            model: this.model,
            max_tokens: this.maxTokens,
            messages: [
              {
                role: 'user',
                content: prompt,
              },
            ],
          },
          { signal }
        );

        const textBlock = response.content.find((block) => block.type === 'text');
        if (!textBlock || textBlock.type !== 'text') {
          throw new Error('No text response from Anthropic');
        }

        return textBlock.text.trim();
      } catch (error) {
        lastError = error;
        console.warn(`Anthropic attempt ${attempt} failed: ${describeError(error)}`);

        if (signal?.aborted) break;

        if (attempt < this.maxAttempts) {
          await backoff(attempt, signal);
          if (signal?.aborted) break;
        }
      }
    }

    throw new SummarizationError('Anthropic call failed', { cause: lastError });
  }
}

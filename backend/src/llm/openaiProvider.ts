import OpenAI from 'openai';
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

/**
 * Chat-completions provider. Any OpenAI-compatible endpoint works through `apiBase`
 * (e.g. https://api.groq.com/openai/v1).
 */
export class OpenAILLMProvider implements LLMProvider {
  readonly type = 'openai' as const;
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private maxAttempts: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'openai') {
      throw new Error('Invalid config type for OpenAILLMProvider');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      // attempts are counted by callWithRetry
      maxRetries: 0,
    });
    this.model = config.model ?? 'gpt-4o-mini';
    this.maxTokens = config.maxTokens ?? 500;
    this.maxAttempts = config.maxAttempts ?? 1;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async summarizeChunk(text: string, context: ChunkContext, options: CallOptions = {}): Promise<string> {
    const response = await this.callWithRetry(buildChunkPrompt(text, context), options.signal);
    const summary = normalizeBulletPoints(response);
    if (!summary) {
      throw new SummarizationError('OpenAI returned no bullet points');
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
      throw new SummarizationError('OpenAI returned no points');
    }
    return points;
  }

  private async callWithRetry(prompt: string, signal?: AbortSignal): Promise<string> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: [
              {
                role: 'user',
                content: prompt,
              },
            ],
            max_tokens: this.maxTokens,
          },
          { signal }
        );

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new Error('Empty response from OpenAI');
        }

        return content;
      } catch (error) {
        lastError = error;
        console.warn(`OpenAI attempt ${attempt} failed: ${describeError(error)}`);

        if (signal?.aborted) break;

        if (attempt < this.maxAttempts) {
          await backoff(attempt, signal);
          if (signal?.aborted) break;
        }
      }
    }

    throw new SummarizationError('OpenAI call failed', { cause: lastError });
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { create, list } = vi.hoisted(() => ({ create: vi.fn(), list: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
    models = { list };
  },
}));

import { OpenAILLMProvider } from './openaiProvider';
import { buildChunkPrompt } from './types';
import { SummarizationError } from '../errors';

const context = { videoTitle: 'Test Video', chunkIndex: 1, totalChunks: 3 };

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe('OpenAILLMProvider', () => {
  beforeEach(() => {
    create.mockReset();
    list.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject a config for another provider', () => {
    expect(() => new OpenAILLMProvider({ type: 'anthropic', apiKey: 'test-key' })).toThrow(
      'Invalid config type for OpenAILLMProvider'
    );
  });

  it('should send the chunk prompt and normalize the reply', async () => {
    create.mockResolvedValue(completion('- First point\n\n2. Second point\n• Third'));
    const provider = new OpenAILLMProvider({
      type: 'openai',
      apiKey: 'test-key',
      model: 'test-model',
      maxTokens: 300,
    });

    const summary = await provider.summarizeChunk('chunk text', context);

    expect(summary).toBe('• First point\n• Second point\n• Third');
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [{ role: 'user', content: buildChunkPrompt('chunk text', context) }],
        max_tokens: 300,
      },
      { signal: undefined }
    );
  });

  it('should wrap API failures in a SummarizationError after one attempt', async () => {
    create.mockRejectedValue(new Error('401 Unauthorized'));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key' });

    const result = provider.summarizeChunk('chunk text', context);

    await expect(result).rejects.toBeInstanceOf(SummarizationError);
    await expect(result).rejects.toThrow('OpenAI call failed');
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('should treat an empty completion as a failure', async () => {
    create.mockResolvedValue(completion(null));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key' });

    await expect(provider.summarizeChunk('chunk text', context)).rejects.toThrow('OpenAI call failed');
  });

  it('should treat a reply with no points as a failure', async () => {
    create.mockResolvedValue(completion('  \n\n  '));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key' });

    await expect(provider.summarizeChunk('chunk text', context)).rejects.toThrow(
      'OpenAI returned no bullet points'
    );
  });

  it('should not retry once the request was aborted', async () => {
    create.mockRejectedValue(new Error('Request was aborted.'));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key', maxAttempts: 3 });
    const controller = new AbortController();
    controller.abort();

    await expect(
      provider.summarizeChunk('chunk text', context, { signal: controller.signal })
    ).rejects.toBeInstanceOf(SummarizationError);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('should retry after a backoff when more attempts are allowed', async () => {
    vi.useFakeTimers();
    create
      .mockRejectedValueOnce(new Error('429 Too Many Requests'))
      .mockResolvedValueOnce(completion('- Recovered point'));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key', maxAttempts: 2 });

    const result = provider.summarizeChunk('chunk text', context);
    await vi.waitFor(() => expect(vi.getTimerCount()).toBe(1));
    expect(create).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);

    expect(await result).toBe('• Recovered point');
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('should stop retrying when aborted during the backoff', async () => {
    vi.useFakeTimers();
    create.mockRejectedValue(new Error('503 Service Unavailable'));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key', maxAttempts: 2 });
    const controller = new AbortController();

    const result = provider.summarizeChunk('chunk text', context, { signal: controller.signal });
    await vi.waitFor(() => expect(vi.getTimerCount()).toBe(1));
    controller.abort();

    await expect(result).rejects.toThrow('OpenAI call failed');
    expect(create).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should split an overview reply into points', async () => {
    create.mockResolvedValue(completion('1. Rivers shape valleys\n2. Floods carry silt\n'));
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key' });

    const points = await provider.summarizeOverview('transcript', { videoTitle: 'Rivers', numPoints: 2 });

    expect(points).toEqual(['Rivers shape valleys', 'Floods carry silt']);
  });

  it('should report connection status from the models endpoint', async () => {
    const provider = new OpenAILLMProvider({ type: 'openai', apiKey: 'test-key' });

    list.mockResolvedValueOnce({ data: [] });
    expect(await provider.testConnection()).toBe(true);

    list.mockRejectedValueOnce(new Error('offline'));
    expect(await provider.testConnection()).toBe(false);
  });
});

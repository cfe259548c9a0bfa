import { describe, it, expect } from 'vitest';
import { processChunk, withTimeout } from './chunkProcessor';
import { FakeSummarizer, failingSummarizer } from '../testing/fakes';
import { Chunk } from '../transcript';
import { SummarizationError } from '../errors';

const chunk: Chunk = [
  { text: 'rivers carve', start: 3725.7, duration: 4 },
  { text: 'deep valleys', start: 3729.7, duration: 30.5 },
];

describe('processChunk', () => {
  it('should build a record from the chunk text and its time span', async () => {
    const summarizer = new FakeSummarizer();

    const record = await processChunk(chunk, 2, 'Geology 101', 5, summarizer, { timeoutMs: 1000 });

    expect(record).toEqual({
      chunk_index: 2,
      start_time: '01:02:05',
      end_time: '01:02:40',
      summary: '• summary of rivers carve deep valleys',
    });
    expect(summarizer.chunkCalls).toEqual([
      {
        text: 'rivers carve deep valleys',
        context: { videoTitle: 'Geology 101', chunkIndex: 2, totalChunks: 5 },
      },
    ]);
  });

  it('should set the summary to null when the summarizer fails', async () => {
    const record = await processChunk(chunk, 0, 'Geology 101', 1, failingSummarizer(), {
      timeoutMs: 1000,
    });

    expect(record.summary).toBeNull();
    expect(record.start_time).toBe('01:02:05');
  });

  it('should set the summary to null and abort the call when it times out', async () => {
    let aborted = false;
    const summarizer = new FakeSummarizer({
      chunk: (_text, _context, { signal }) =>
        new Promise<string>(() => {
          signal?.addEventListener('abort', () => {
            aborted = true;
          });
        }),
    });

    const record = await processChunk(chunk, 0, 'Geology 101', 1, summarizer, { timeoutMs: 20 });

    expect(record.summary).toBeNull();
    expect(aborted).toBe(true);
  });

  it('should call the summarizer exactly once', async () => {
    const summarizer = failingSummarizer();

    await processChunk(chunk, 0, 'Geology 101', 1, summarizer, { timeoutMs: 1000 });

    expect(summarizer.chunkCalls).toHaveLength(1);
  });

  it('should reject an empty chunk', async () => {
    await expect(
      processChunk([], 4, 'Geology 101', 5, new FakeSummarizer(), { timeoutMs: 1000 })
    ).rejects.toThrow('Chunk 4 is empty');
  });
});

describe('withTimeout', () => {
  it('should resolve with the task result when it finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done');
  });

  it('should reject with a SummarizationError after the limit', async () => {
    const result = withTimeout(() => new Promise<string>(() => undefined), 10);

    await expect(result).rejects.toBeInstanceOf(SummarizationError);
    await expect(result).rejects.toThrow('Summarizer timed out after 10ms');
  });
});

import { Chunk, SummaryRecord, chunkText, formatTimestamp } from '../transcript';
import { Summarizer } from '../llm';
import { SummarizationError, describeError } from '../errors';

export interface ChunkProcessorOptions {
  /** Per-call limit on the summarizer, in milliseconds */
  timeoutMs: number;
}

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`.
 * Rejects with `SummarizationError` on timeout even if the task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SummarizationError(`Summarizer timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Summarizes one chunk. Summarizer failures and timeouts yield `summary: null`;
 * they never reject.
 */
export async function processChunk(
  chunk: Chunk,
  index: number,
  videoTitle: string,
  totalChunks: number,
  summarizer: Summarizer,
  options: ChunkProcessorOptions
): Promise<SummaryRecord> {
  const first = chunk[0];
  const last = chunk[chunk.length - 1];
  if (!first || !last) {
    throw new Error(`Chunk ${index} is empty`);
  }

  const text = chunkText(chunk);
  let summary: string | null = null;

  try {
    summary = await withTimeout(
      (signal) =>
        summarizer.summarizeChunk(text, { videoTitle, chunkIndex: index, totalChunks }, { signal }),
      options.timeoutMs
    );
  } catch (error) {
    console.warn(`Summary failed for chunk ${index + 1}/${totalChunks}: ${describeError(error)}`);
  }

  return {
    chunk_index: index,
    start_time: formatTimestamp(first.start),
    end_time: formatTimestamp(last.start + last.duration),
    summary,
  };
}

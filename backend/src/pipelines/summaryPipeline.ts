import {
  CaptionEntry,
  Chunk,
  MetadataSource,
  SummaryRecord,
  TranscriptSource,
  VideoOverview,
  chunkText,
  chunkTranscript,
  extractVideoId,
  fallbackTitle,
} from '../transcript';
import { Summarizer } from '../llm';
import {
  InvalidConfigError,
  InvalidInputError,
  SummarizationFailedError,
  TranscriptUnavailableError,
  describeError,
} from '../errors';
import { processChunk, withTimeout } from './chunkProcessor';
import { runWithConcurrency } from './workerPool';

export interface SummaryPipelineOptions {
  transcriptSource: TranscriptSource;
  metadataSource: MetadataSource;
  summarizer: Summarizer;
  /** A chunk closes once its captions add up to this many seconds */
  chunkDurationSeconds: number;
  /** Maximum summarizer calls in flight per request */
  concurrency: number;
  /** Per-call summarizer timeout */
  summaryTimeoutMs: number;
}

/**
 * Turns a video URL into timestamped bullet-point summaries.
 * One instance serves many requests; it holds no per-request state.
 */
export class SummaryPipeline {
  private transcriptSource: TranscriptSource;
  private metadataSource: MetadataSource;
  private summarizer: Summarizer;
  private chunkDurationSeconds: number;
  private concurrency: number;
  private summaryTimeoutMs: number;

  constructor(options: SummaryPipelineOptions) {
    if (!Number.isFinite(options.chunkDurationSeconds) || options.chunkDurationSeconds <= 0) {
      throw new InvalidConfigError('chunkDurationSeconds must be a positive number');
    }
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new InvalidConfigError('concurrency must be a positive integer');
    }
    if (!(options.summaryTimeoutMs > 0)) {
      throw new InvalidConfigError('summaryTimeoutMs must be positive');
    }

    this.transcriptSource = options.transcriptSource;
    this.metadataSource = options.metadataSource;
    this.summarizer = options.summarizer;
    this.chunkDurationSeconds = options.chunkDurationSeconds;
    this.concurrency = options.concurrency;
    this.summaryTimeoutMs = options.summaryTimeoutMs;
  }

  /**
   * Summarizes a video chunk by chunk
   * @param videoUrl - YouTube URL or bare video ID
   * @returns One record per chunk, ordered by chunk_index
   */
  async run(videoUrl: string): Promise<SummaryRecord[]> {
    const videoId = this.resolveVideoId(videoUrl);
    const transcript = await this.fetchTranscript(videoId);
    const title = await this.resolveTitle(videoId);

    const chunks = chunkTranscript(transcript, this.chunkDurationSeconds);
    console.info(
      `[${videoId}] "${title}": ${transcript.length} captions in ${chunks.length} chunk(s)`
    );

    const records = await this.summarizeChunks(chunks, title);
    const failed = records.filter((record) => record.summary === null).length;
    if (failed > 0) {
      console.warn(`[${videoId}] ${failed}/${records.length} chunk(s) have no summary`);
    }

    return records;
  }

  /**
   * Summarizes already-chunked captions on the worker pool
   */
  async summarizeChunks(chunks: readonly Chunk[], videoTitle: string): Promise<SummaryRecord[]> {
    const totalChunks = chunks.length;

    return runWithConcurrency(chunks, Math.min(this.concurrency, Math.max(1, totalChunks)), (chunk, index) =>
      processChunk(chunk, index, videoTitle, totalChunks, this.summarizer, {
        timeoutMs: this.summaryTimeoutMs,
      })
    );
  }

  /**
   * Summarizes the whole transcript into a flat list of main points
   * @param videoUrl - YouTube URL or bare video ID
   * @param numPoints - How many points to ask for
   */
  async overview(videoUrl: string, numPoints: number = 6): Promise<VideoOverview> {
    const videoId = this.resolveVideoId(videoUrl);
    const transcript = await this.fetchTranscript(videoId);
    const title = await this.resolveTitle(videoId);
    const text = chunkText(transcript);

    try {
      const points = await withTimeout(
        (signal) => this.summarizer.summarizeOverview(text, { videoTitle: title, numPoints }, { signal }),
        this.summaryTimeoutMs
      );
      return { videoId, title, points };
    } catch (error) {
      console.error(`[${videoId}] Overview failed: ${describeError(error)}`);
      throw new SummarizationFailedError('Failed to generate summary', error);
    }
  }

  private resolveVideoId(videoUrl: string): string {
    const videoId = extractVideoId(videoUrl);
    if (!videoId) {
      throw new InvalidInputError('Invalid YouTube URL');
    }
    return videoId;
  }

  private async fetchTranscript(videoId: string): Promise<CaptionEntry[]> {
    let transcript: CaptionEntry[];
    try {
      transcript = await this.transcriptSource.fetchTranscript(videoId);
    } catch (error) {
      console.error(`[${videoId}] Error fetching transcript: ${describeError(error)}`);
      throw new TranscriptUnavailableError('Failed to fetch transcript', error);
    }

    if (transcript.length === 0) {
      throw new TranscriptUnavailableError('Failed to fetch transcript');
    }
    return transcript;
  }

  private async resolveTitle(videoId: string): Promise<string> {
    try {
      return await this.metadataSource.getTitle(videoId);
    } catch (error) {
      console.warn(`[${videoId}] Error fetching video title: ${describeError(error)}`);
      return fallbackTitle(videoId);
    }
  }
}

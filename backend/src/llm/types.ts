import { LLMProviderType } from '../config';

export type { LLMProviderType };

/**
 * Configuration for an LLM provider
 */
export interface LLMProviderConfig {
  type: LLMProviderType;
  apiKey: string;
  model?: string;
  apiBase?: string;
  /** Upper bound on generated tokens per call */
  maxTokens?: number;
  /** Total attempts per call, including the first one */
  maxAttempts?: number;
}

/**
 * Where a chunk sits in the video, so the model can summarize it in context
 */
export interface ChunkContext {
  videoTitle: string;
  /** 0-based */
  chunkIndex: number;
  totalChunks: number;
}

export interface OverviewContext {
  videoTitle: string;
  numPoints: number;
}

export interface CallOptions {
  /** Aborts the outbound request */
  signal?: AbortSignal;
}

/**
 * Turns transcript text into bullet points.
 * Implementations reject with `SummarizationError` on any failure.
 */
export interface Summarizer {
  /**
   * Summarizes one chunk of a transcript
   * @returns Bullet points, one per line, each starting with "• "
   */
  summarizeChunk(text: string, context: ChunkContext, options?: CallOptions): Promise<string>;

  /**
   * Summarizes a whole transcript into its main points
   * @returns Points without bullet markers
   */
  summarizeOverview(text: string, context: OverviewContext, options?: CallOptions): Promise<string[]>;
}

/**
 * LLM Provider interface - all providers must implement this
 */
export interface LLMProvider extends Summarizer {
  /**
   * Provider type identifier
   */
  readonly type: LLMProviderType;

  /**
   * Tests the connection to the LLM provider
   * @returns True if connection is successful
   */
  testConnection(): Promise<boolean>;
}

/**
 * Prompt template for one transcript chunk
 */
export function buildChunkPrompt(text: string, context: ChunkContext): string {
  return `Summarize the following chunk of transcript from the video titled '${context.videoTitle}'.
This is chunk ${context.chunkIndex + 1} out of ${context.totalChunks}.
Provide exactly 5-6 bullet points that fit into the context of the entire video. Do not include any introductory text or headers, only the bullet points:

${text}

Bullet Points (5-6):`;
}

/**
 * Prompt template for a whole-video overview
 */
export function buildOverviewPrompt(text: string, context: OverviewContext): string {
  return `Summarize the following transcript of the video titled '${context.videoTitle}' into ${context.numPoints} main points.
Write one point per line. Do not include any introductory text or headers.

${text}`;
}

import axios from 'axios';

const api = axios.create({
  baseURL: '/api',
  headers: {
    'Content-Type': 'application/json',
  },
});

// Types
export type LLMProvider = 'openai' | 'anthropic';
export type SummaryMode = 'timeline' | 'overview';
export type ErrorKind = 'InvalidInput' | 'TranscriptUnavailable' | 'SummarizationFailed' | 'Internal' | 'NotFound';

export interface SummaryRecord {
  chunk_index: number;
  start_time: string;
  end_time: string;
  summary: string | null;
}

export interface VideoOverview {
  videoId: string;
  title: string;
  points: string[];
}

export interface ApiErrorBody {
  error: {
    kind: ErrorKind;
    message: string;
  };
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  services: {
    llm: { openai: boolean; anthropic: boolean };
  };
  config: {
    defaultProvider: LLMProvider;
    chunkDurationSeconds: number;
    summaryConcurrency: number;
    summaryTimeoutMs: number;
  };
}

// API functions
export async function getHealth(): Promise<HealthStatus> {
  const response = await api.get<HealthStatus>('/health');
  return response.data;
}

export async function summarizeVideo(url: string, llmProvider: LLMProvider): Promise<SummaryRecord[]> {
  const response = await api.post<SummaryRecord[]>('/summarize', { url, llmProvider });
  return response.data;
}

export async function getOverview(
  url: string,
  llmProvider: LLMProvider,
  numPoints: number
): Promise<VideoOverview> {
  const response = await api.post<VideoOverview>('/overview', { url, llmProvider, numPoints });
  return response.data;
}

/**
 * Picks the server's error message out of a failed request
 */
export function getErrorMessage(err: unknown, fallback: string): string {
  if (axios.isAxiosError<Partial<ApiErrorBody>>(err)) {
    return err.response?.data?.error?.message ?? fallback;
  }
  return err instanceof Error ? err.message : fallback;
}

/**
 * Splits a chunk summary into its bullet points, without the markers
 */
export function summaryLines(summary: string | null): string[] {
  if (!summary) return [];
  return summary
    .split('\n')
    .map((line) => line.replace(/^•\s*/, '').trim())
    .filter((line) => line.length > 0);
}

import { InvalidInputError } from '../errors';
import { LLMProviderType, isLLMProviderType } from '../llm';

export interface SummarizeRequest {
  url: string;
  llmProvider?: LLMProviderType;
}

export interface OverviewRequest extends SummarizeRequest {
  numPoints?: number;
}

export const MAX_OVERVIEW_POINTS = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the body of POST /api/summarize
 */
export function parseSummarizeRequest(body: unknown): SummarizeRequest {
  if (!isRecord(body)) {
    throw new InvalidInputError('Request body must be a JSON object');
  }

  const { url, llmProvider } = body;
  if (typeof url !== 'string' || !url.trim()) {
    throw new InvalidInputError('Missing YouTube URL');
  }

  if (llmProvider !== undefined && !isLLMProviderType(llmProvider)) {
    throw new InvalidInputError('llmProvider must be openai or anthropic');
  }

  return { url, llmProvider };
}

/**
 * Validates the body of POST /api/overview
 */
export function parseOverviewRequest(body: unknown): OverviewRequest {
  const request = parseSummarizeRequest(body);
  const numPoints = isRecord(body) ? body.numPoints : undefined;

  if (numPoints === undefined) {
    return request;
  }

  if (
    typeof numPoints !== 'number' ||
    !Number.isInteger(numPoints) ||
    numPoints < 1 ||
    numPoints > MAX_OVERVIEW_POINTS
  ) {
    throw new InvalidInputError(`numPoints must be an integer between 1 and ${MAX_OVERVIEW_POINTS}`);
  }

  return { ...request, numPoints };
}

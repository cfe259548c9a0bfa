import { Router, Request, Response } from 'express';
import { LLMProvider, LLMProviderType, testAllProviders } from '../llm';
import { asyncHandler } from './summarize';

export interface HealthRouterDeps {
  providers: ReadonlyMap<LLMProviderType, LLMProvider>;
  defaultProvider: LLMProviderType;
  chunkDurationSeconds: number;
  summaryConcurrency: number;
  summaryTimeoutMs: number;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const llmStatus = await testAllProviders(deps.providers);

      res.json({
        status: llmStatus.get(deps.defaultProvider) ? 'healthy' : 'degraded',
        services: {
          llm: {
            openai: llmStatus.get('openai') ?? false,
            anthropic: llmStatus.get('anthropic') ?? false,
          },
        },
        config: {
          defaultProvider: deps.defaultProvider,
          chunkDurationSeconds: deps.chunkDurationSeconds,
          summaryConcurrency: deps.summaryConcurrency,
          summaryTimeoutMs: deps.summaryTimeoutMs,
        },
      });
    })
  );

  return router;
}

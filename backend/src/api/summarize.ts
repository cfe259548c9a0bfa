import { Router, Request, Response, NextFunction } from 'express';
import { SummaryPipeline } from '../pipelines';
import { LLMProviderType } from '../llm';
import { parseOverviewRequest, parseSummarizeRequest } from './requests';

export interface SummarizeRouterDeps {
  pipelines: ReadonlyMap<LLMProviderType, SummaryPipeline>;
  defaultProvider: LLMProviderType;
}

/**
 * Error handler wrapper
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

function pipelineFor(deps: SummarizeRouterDeps, provider: LLMProviderType | undefined): SummaryPipeline {
  const type = provider ?? deps.defaultProvider;
  const pipeline = deps.pipelines.get(type);
  if (!pipeline) {
    throw new Error(`No pipeline configured for provider ${type}`);
  }
  return pipeline;
}

export function createSummarizeRouter(deps: SummarizeRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/summarize
   * Summarize a video chunk by chunk
   */
  router.post(
    '/summarize',
    asyncHandler(async (req: Request, res: Response) => {
      const { url, llmProvider } = parseSummarizeRequest(req.body);
      const records = await pipelineFor(deps, llmProvider).run(url);
      res.json(records);
    })
  );

  /**
   * POST /api/overview
   * Summarize a whole video into its main points
   */
  router.post(
    '/overview',
    asyncHandler(async (req: Request, res: Response) => {
      const { url, llmProvider, numPoints } = parseOverviewRequest(req.body);
      const overview = await pipelineFor(deps, llmProvider).overview(url, numPoints);
      res.json(overview);
    })
  );

  return router;
}

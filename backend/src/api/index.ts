import { Router } from 'express';
import { createSummarizeRouter, SummarizeRouterDeps } from './summarize';
import { createHealthRouter, HealthRouterDeps } from './health';

export type ApiDeps = SummarizeRouterDeps & HealthRouterDeps;

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();

  router.use(createSummarizeRouter(deps));
  router.use(createHealthRouter(deps));

  return router;
}

export * from './requests';

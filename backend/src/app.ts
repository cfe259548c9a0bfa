import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createApiRouter, ApiDeps } from './api';
import { PipelineError, PipelineErrorKind } from './errors';

export interface AppOptions extends ApiDeps {
  nodeEnv: string;
  /** Built front end; served at / when the directory exists */
  staticDir?: string;
}

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
  InvalidInput: 400,
  TranscriptUnavailable: 400,
  SummarizationFailed: 502,
};

function isJsonParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.on('finish', () => {
      console.info(
        `[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`
      );
    });
    next();
  });
  app.use(express.json());

  // API routes
  app.use('/api', createApiRouter(options));

  // Single-page front end
  const staticDir = options.staticDir;
  if (staticDir && fs.existsSync(staticDir)) {
    app.use(express.static(staticDir));
    app.get(/^\/(?!api\/).*/, (_req: Request, res: Response) => {
      res.sendFile(path.join(staticDir, 'index.html'));
    });
  }

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof PipelineError) {
      res.status(STATUS_BY_KIND[err.kind]).json({ error: err.toJSON() });
      return;
    }

    if (isJsonParseError(err)) {
      res.status(400).json({ error: { kind: 'InvalidInput', message: 'Request body is not valid JSON' } });
      return;
    }

    console.error(`[${String(res.locals.requestId)}] Error:`, err);
    res.status(500).json({
      error: {
        kind: 'Internal',
        message: options.nodeEnv === 'development' ? err.message : 'Internal server error',
      },
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { kind: 'NotFound', message: 'Not found' } });
  });

  return app;
}

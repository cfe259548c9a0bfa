import { createApp } from './app';
import { config, LLM_PROVIDER_TYPES } from './config';
import { createLLMProvider, LLMProvider, LLMProviderType } from './llm';
import { SummaryPipeline } from './pipelines';
import { OEmbedMetadataSource, YoutubeTranscriptSource } from './transcript';

const transcriptSource = new YoutubeTranscriptSource();
const metadataSource = new OEmbedMetadataSource({ timeoutMs: config.metadataTimeoutMs });

const providers = new Map<LLMProviderType, LLMProvider>();
const pipelines = new Map<LLMProviderType, SummaryPipeline>();

for (const type of LLM_PROVIDER_TYPES) {
  const provider = createLLMProvider(type, config);
  providers.set(type, provider);
  pipelines.set(
    type,
    new SummaryPipeline({
      transcriptSource,
      metadataSource,
      summarizer: provider,
      chunkDurationSeconds: config.chunkDurationSeconds,
      concurrency: config.summaryConcurrency,
      summaryTimeoutMs: config.summaryTimeoutMs,
    })
  );
}

const app = createApp({
  pipelines,
  providers,
  defaultProvider: config.defaultLlmProvider,
  chunkDurationSeconds: config.chunkDurationSeconds,
  summaryConcurrency: config.summaryConcurrency,
  summaryTimeoutMs: config.summaryTimeoutMs,
  nodeEnv: config.nodeEnv,
  staticDir: config.staticDir,
});

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 Video Summarizer Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Default LLM provider: ${config.defaultLlmProvider}`);
  console.info(`   Chunk duration: ${config.chunkDurationSeconds}s, concurrency: ${config.summaryConcurrency}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health          - Check service status`);
  console.info(`   - POST /api/summarize       - Summarize a video chunk by chunk`);
  console.info(`   - POST /api/overview        - Summarize a video into main points`);
  console.info(`\n`);
});

export default app;

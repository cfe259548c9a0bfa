export * from './summaryPipeline';
export * from './chunkProcessor';
export * from './workerPool';

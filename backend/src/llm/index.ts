export * from './types';
export * from './bulletPoints';
export * from './retry';
export * from './openaiProvider';
export * from './anthropicProvider';
export * from './llmFactory';

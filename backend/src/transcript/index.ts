export * from './types';
export * from './chunker';
export * from './timestamps';
export * from './videoId';
export * from './metadataSource';
export * from './youtubeTranscriptSource';

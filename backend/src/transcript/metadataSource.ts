import axios, { AxiosInstance } from 'axios';
import { MetadataSource } from './types';
import { watchUrl } from './videoId';

const OEMBED_ENDPOINT = 'https://www.youtube.com/oembed';

export interface OEmbedMetadataSourceOptions {
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Looks up a video's title through YouTube's oEmbed endpoint
 */
export class OEmbedMetadataSource implements MetadataSource {
  private http: AxiosInstance;

  constructor(options: OEmbedMetadataSourceOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 5000 });
  }

  async getTitle(videoId: string): Promise<string> {
    const response = await this.http.get<{ title?: unknown }>(OEMBED_ENDPOINT, {
      params: { url: watchUrl(videoId), format: 'json' },
    });

    const title = response.data.title;
    if (typeof title !== 'string' || !title.trim()) {
      throw new Error(`oEmbed response for ${videoId} has no title`);
    }
    return title.trim();
  }
}

/**
 * Title used when the metadata lookup fails
 */
export function fallbackTitle(videoId: string): string {
  return `Video ${videoId}`;
}

import { describe, it, expect } from 'vitest';
import axios, { InternalAxiosRequestConfig } from 'axios';
import { OEmbedMetadataSource, fallbackTitle } from './metadataSource';

function stubHttp(data: unknown, seen: InternalAxiosRequestConfig[] = []) {
  return axios.create({
    adapter: async (requestConfig) => {
      seen.push(requestConfig);
      return { data, status: 200, statusText: 'OK', headers: {}, config: requestConfig };
    },
  });
}

describe('OEmbedMetadataSource', () => {
  it('should request the oEmbed document for the watch URL', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const source = new OEmbedMetadataSource({ http: stubHttp({ title: ' A Talk About Rivers ' }, seen) });

    const title = await source.getTitle('abcDEF12345');

    expect(title).toBe('A Talk About Rivers');
    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe('https://www.youtube.com/oembed');
    expect(seen[0]?.params).toEqual({
      url: 'https://www.youtube.com/watch?v=abcDEF12345',
      format: 'json',
    });
  });

  it('should reject when the response has no title', async () => {
    const source = new OEmbedMetadataSource({ http: stubHttp({ author_name: 'someone' }) });

    await expect(source.getTitle('abc')).rejects.toThrow('oEmbed response for abc has no title');
  });

  it('should propagate transport errors', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('network down');
      },
    });

    await expect(new OEmbedMetadataSource({ http }).getTitle('abc')).rejects.toThrow('network down');
  });
});

describe('fallbackTitle', () => {
  it('should derive the title from the video ID', () => {
    expect(fallbackTitle('abcDEF12345')).toBe('Video abcDEF12345');
  });
});

import { describe, it, expect } from 'vitest';
import { extractVideoId, watchUrl } from './videoId';

describe('extractVideoId', () => {
  it('should extract the ID from a short link', () => {
    expect(extractVideoId('https://youtu.be/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  it('should extract the ID from a watch URL', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://youtube.com/watch?v=dQw4w9WgXcQ&t=42s')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://m.youtube.com/watch?v=abc123')).toBe('abc123');
  });

  it('should extract the ID from embed and /v/ URLs', () => {
    expect(extractVideoId('https://www.youtube.com/embed/abcDEF12345')).toBe('abcDEF12345');
    expect(extractVideoId('https://www.youtube.com/v/abcDEF12345?version=3')).toBe('abcDEF12345');
  });

  it('should accept a bare video ID', () => {
    expect(extractVideoId('  dQw4w9WgXcQ ')).toBe('dQw4w9WgXcQ');
  });

  it('should return null for unrecognized input', () => {
    expect(extractVideoId('https://example.com/notyoutube')).toBeNull();
    expect(extractVideoId('https://www.youtube.com/watch')).toBeNull();
    expect(extractVideoId('https://youtu.be/')).toBeNull();
    expect(extractVideoId('https://www.youtube.com/playlist?list=PLtest123')).toBeNull();
    expect(extractVideoId('not a url')).toBeNull();
    expect(extractVideoId('')).toBeNull();
  });
});

describe('watchUrl', () => {
  it('should build the canonical watch URL', () => {
    expect(watchUrl('dQw4w9WgXcQ')).toBe('https://www.youtube.com/watch?v=dQw4w9WgXcQ');
  });
});

import { describe, it, expect } from 'vitest';
import { getErrorMessage, summaryLines } from './index';

describe('summaryLines', () => {
  it('should split a summary into points without bullets', () => {
    expect(summaryLines('• First point\n• Second point\n\n')).toEqual(['First point', 'Second point']);
  });

  it('should return no lines for a missing summary', () => {
    expect(summaryLines(null)).toEqual([]);
  });
});

describe('getErrorMessage', () => {
  it('should use the message from the API error body', () => {
    const err = {
      isAxiosError: true,
      response: { data: { error: { kind: 'InvalidInput', message: 'Invalid YouTube URL' } } },
    };

    expect(getErrorMessage(err, 'Failed to summarize video')).toBe('Invalid YouTube URL');
  });

  it('should fall back when the response has no error body', () => {
    expect(getErrorMessage({ isAxiosError: true }, 'Failed to summarize video')).toBe(
      'Failed to summarize video'
    );
  });

  it('should use the message of a plain error', () => {
    expect(getErrorMessage(new Error('Network Error'), 'fallback')).toBe('Network Error');
    expect(getErrorMessage('weird', 'fallback')).toBe('fallback');
  });
});

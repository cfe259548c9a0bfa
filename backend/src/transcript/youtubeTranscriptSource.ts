import { YoutubeTranscript } from 'youtube-transcript';
import { CaptionEntry, TranscriptSource } from './types';

export interface YoutubeTranscriptSourceOptions {
  /** Preferred caption language (e.g. "en"); the video's default track when omitted */
  lang?: string;
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Caption text arrives HTML-escaped, sometimes twice (`&amp;#39;`).
 */
export function decodeCaptionText(text: string): string {
  let decoded = text;
  for (let pass = 0; pass < 2; pass++) {
    decoded = decoded.replace(/&(amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
  }
  return decoded.replace(/\s+/g, ' ').trim();
}

/**
 * Reads captions through the public YouTube timed-text endpoint
 */
export class YoutubeTranscriptSource implements TranscriptSource {
  private lang?: string;

  constructor(options: YoutubeTranscriptSourceOptions = {}) {
    this.lang = options.lang;
  }

  async fetchTranscript(videoId: string): Promise<CaptionEntry[]> {
    const items = await YoutubeTranscript.fetchTranscript(
      videoId,
      this.lang ? { lang: this.lang } : undefined
    );

    return items.map((item) => ({
      text: decodeCaptionText(item.text),
      start: item.offset,
      duration: item.duration,
    }));
  }
}

/**
 * One timed caption fragment as returned by the transcript service
 */
export interface CaptionEntry {
  /** Caption text */
  text: string;
  /** Offset from the start of the video, in seconds */
  start: number;
  /** How long the caption is shown, in seconds */
  duration: number;
}

/**
 * A contiguous, non-empty run of caption entries summarized in one LLM call
 */
export type Chunk = CaptionEntry[];

/**
 * Summary of one chunk as returned to API callers
 */
export interface SummaryRecord {
  /** 0-based position of the chunk */
  chunk_index: number;
  /** HH:MM:SS of the first entry's start */
  start_time: string;
  /** HH:MM:SS of the last entry's start + duration */
  end_time: string;
  /** Bullet points, or null when summarization failed for this chunk */
  summary: string | null;
}

/**
 * Whole-video summary as a flat list of main points
 */
export interface VideoOverview {
  videoId: string;
  title: string;
  points: string[];
}

/**
 * Fetches the captions of a video
 */
export interface TranscriptSource {
  fetchTranscript(videoId: string): Promise<CaptionEntry[]>;
}

/**
 * Resolves a display title for a video
 */
export interface MetadataSource {
  getTitle(videoId: string): Promise<string>;
}

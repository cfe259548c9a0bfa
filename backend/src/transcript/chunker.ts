import { InvalidConfigError } from '../errors';
import { CaptionEntry, Chunk } from './types';

/**
 * Groups consecutive caption entries into chunks by accumulated duration.
 * A chunk is closed as soon as the sum of its durations reaches the threshold;
 * the last chunk may fall short of it.
 * @param entries - Caption entries ordered by start time
 * @param threshold - Minimum duration of a closed chunk, in seconds
 * @returns Chunks in order; concatenated they equal `entries`
 */
export function chunkTranscript(entries: readonly CaptionEntry[], threshold: number): Chunk[] {
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new InvalidConfigError(`Chunk threshold must be a positive number of seconds, got ${threshold}`);
  }

  const chunks: Chunk[] = [];
  let current: Chunk = [];
  let currentDuration = 0;

  for (const entry of entries) {
    current.push(entry);
    currentDuration += entry.duration;

    if (currentDuration >= threshold) {
      chunks.push(current);
      current = [];
      currentDuration = 0;
    }
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

/**
 * Sums the durations of a chunk's entries
 */
export function chunkDuration(chunk: readonly CaptionEntry[]): number {
  return chunk.reduce((sum, entry) => sum + entry.duration, 0);
}

/**
 * Joins caption texts with single spaces, in order
 */
export function chunkText(chunk: readonly CaptionEntry[]): string {
  return chunk.map((entry) => entry.text).join(' ');
}

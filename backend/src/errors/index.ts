/**
 * Failure kinds that abort a request and are reported to the caller
 */
export type PipelineErrorKind = 'InvalidInput' | 'TranscriptUnavailable' | 'SummarizationFailed';

/**
 * Base class for errors that end a summary request
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): { kind: PipelineErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * The supplied URL does not identify a YouTube video
 */
export class InvalidInputError extends PipelineError {
  constructor(message: string) {
    super('InvalidInput', message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Captions are disabled, the video is missing, or the transcript service failed
 */
export class TranscriptUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('TranscriptUnavailable', message, { cause });
    this.name = 'TranscriptUnavailableError';
  }
}

/**
 * Whole-video overview could not be generated
 */
export class SummarizationFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('SummarizationFailed', message, { cause });
    this.name = 'SummarizationFailedError';
  }
}

/**
 * Raised by a summarizer backend. Per-chunk callers turn it into a null summary.
 */
export class SummarizationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SummarizationError';
  }
}

/**
 * Raised for configuration values the pipeline cannot run with
 */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Flattens an error and its causes into one line for logging
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  const parts: string[] = [error.message];
  let cause: unknown = error.cause;
  while (cause !== undefined && parts.length < 4) {
    if (cause instanceof Error) {
      parts.push(`[cause: ${cause.message}]`);
      cause = cause.cause;
    } else {
      parts.push(`[cause: ${String(cause)}]`);
      break;
    }
  }
  return parts.join(' ');
}

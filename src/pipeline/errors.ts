/**
 * Error classes raised by the clip finder.
 *
 * Every failure a caller must tell apart from "no matches" has its own class;
 * an empty query is not an error and never surfaces here.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all clip finder errors
 */
export class ClipperError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(message: string, code = 'clipper_error', details?: ErrorDetails) {
    super(message);
    this.name = 'ClipperError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * No transcript exists for the requested video
 */
export class TranscriptNotFoundError extends ClipperError {
  videoId: string;

  constructor(videoId: string) {
    super(`No transcript found for video ${videoId}. Run transcription first.`, 'transcript_not_found', { videoId });
    this.name = 'TranscriptNotFoundError';
    this.videoId = videoId;
  }
}

/**
 * A transcription job for the video is still pending or running
 */
export class TranscriptPendingError extends ClipperError {
  videoId: string;

  constructor(videoId: string, status: string) {
    super(`Transcription for video ${videoId} is not finished (status: ${status})`, 'transcript_pending', {
      videoId,
      status,
    });
    this.name = 'TranscriptPendingError';
    this.videoId = videoId;
  }
}

/**
 * The last transcription job for the video failed
 */
export class TranscriptionFailedError extends ClipperError {
  videoId: string;
  reason: string;

  constructor(videoId: string, reason: string) {
    super(`Transcription for video ${videoId} failed: ${reason}`, 'transcription_failed', { videoId, reason });
    this.name = 'TranscriptionFailedError';
    this.videoId = videoId;
    this.reason = reason;
  }
}

/**
 * Clip range is empty, inverted, negative or not a number
 */
export class InvalidRangeError extends ClipperError {
  start: number;
  end: number;

  constructor(start: number, end: number, reason: string) {
    super(`Invalid clip range [${start}, ${end}): ${reason}`, 'invalid_range', { start, end });
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/**
 * The media trimmer reported a failure; `diagnostic` holds its own output
 */
export class TrimFailureError extends ClipperError {
  diagnostic: string;
  exitCode?: number;

  constructor(message: string, diagnostic: string, exitCode?: number) {
    super(diagnostic ? `${message}: ${diagnostic}` : message, 'trim_failed', { exitCode });
    this.name = 'TrimFailureError';
    this.diagnostic = diagnostic;
    this.exitCode = exitCode;
  }
}

export class MediaNotFoundError extends ClipperError {
  constructor(videoId: string) {
    super(`No media file found for video ${videoId}`, 'media_not_found', { videoId });
    this.name = 'MediaNotFoundError';
  }
}

export class UnsupportedMediaError extends ClipperError {
  constructor(filename: string, allowed: readonly string[]) {
    super(`Unsupported file type: ${filename}. Allowed: ${allowed.join(', ')}`, 'unsupported_media', {
      filename,
    });
    this.name = 'UnsupportedMediaError';
  }
}

export class MediaTooLargeError extends ClipperError {
  constructor(sizeBytes: number, maxBytes: number) {
    super(
      `File is too large (${sizeBytes} bytes, max ${Math.floor(maxBytes / 1024 / 1024)}MB)`,
      'media_too_large',
      { sizeBytes, maxBytes }
    );
    this.name = 'MediaTooLargeError';
  }
}

/**
 * Transcript JSON does not have the persisted shape
 */
export class InvalidTranscriptError extends ClipperError {
  constructor(message: string, source?: string) {
    super(source ? `Invalid transcript ${source}: ${message}` : `Invalid transcript: ${message}`, 'invalid_transcript', {
      source,
    });
    this.name = 'InvalidTranscriptError';
  }
}

export class ConfigError extends ClipperError {
  constructor(message: string) {
    super(message, 'config_error');
    this.name = 'ConfigError';
  }
}

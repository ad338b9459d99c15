export type ISO8601 = string;

/** Seconds from the start of the media. */
export type Seconds = number;

export interface WordTimestamp {
  readonly text: string;
  readonly start: Seconds;
  readonly end: Seconds;
  /** Recogniser confidence in [0, 1]. */
  readonly confidence: number;
}

export interface Segment {
  readonly start: Seconds;
  readonly end: Seconds;
  /** Display text; may carry separators that no token contains. */
  readonly text: string;
  readonly words: readonly WordTimestamp[];
}

export interface Transcript {
  readonly videoId: string;
  readonly segments: readonly Segment[];
  readonly language: string;
  readonly createdAt: ISO8601;
}

export interface Match {
  matchedText: string;
  start: Seconds;
  end: Seconds;
  /** Text of the owning segment. */
  context: string;
  segmentIndex: number;
}

export interface ClipRange {
  start: Seconds;
  end: Seconds;
}

export interface ResolvedMatch extends Match {
  range: ClipRange;
  startLabel: string;
  endLabel: string;
}

export interface SearchResult {
  keyword: string;
  matches: ResolvedMatch[];
  totalMatches: number;
}

/* On-disk transcript format */

export interface WordJson {
  word: string;
  start: number;
  end: number;
  probability: number;
}

export interface SegmentJson {
  start: number;
  end: number;
  text: string;
  words: WordJson[];
}

export interface TranscriptJson {
  video_id: string;
  segments: SegmentJson[];
  language: string;
  created_at: ISO8601;
}

export interface MediaRecord {
  videoId: string;
  /** Name the file was submitted under. */
  filename: string;
  filePath: string;
  uploadedAt: ISO8601;
  sizeBytes: number;
  durationSec?: number;
}

export type JobStatus = 'pending' | 'running' | 'done' | 'failed';

interface JobBase {
  videoId: string;
  mediaPath: string;
  updatedAt: ISO8601;
}

export type JobRecord =
  | (JobBase & { status: 'pending' })
  | (JobBase & { status: 'running' })
  | (JobBase & { status: 'done'; transcriptPath: string; segmentCount: number })
  | (JobBase & { status: 'failed'; reason: string });

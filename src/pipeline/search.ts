import { TranscriptNotFoundError, TranscriptPendingError, TranscriptionFailedError } from './errors';
import type { JobStore } from './jobs';
import { debug, info } from './log';
import { findMatches, type MatchOptions } from './match';
import { resolveRange, type ClipPolicy } from './range';
import { formatTimestamp } from './timestamp';
import type { TranscriptStore } from './transcript';
import type { SearchResult, Transcript } from './types';

export interface SearchDeps {
  transcripts: TranscriptStore;
  jobs: JobStore;
}

export interface SearchOptions extends MatchOptions {
  policy: ClipPolicy;
  durationSec?: number;
}

/**
 * The transcript to search, or the reason there is none. A job record
 * decides first; without one the stored transcript is used as-is.
 */
export async function lookupTranscript(deps: SearchDeps, videoId: string): Promise<Transcript> {
  const job = await deps.jobs.get(videoId);
  if (job?.status === 'pending' || job?.status === 'running') {
    throw new TranscriptPendingError(videoId, job.status);
  }
  if (job?.status === 'failed') {
    throw new TranscriptionFailedError(videoId, job.reason);
  }
  const transcript = await deps.transcripts.load(videoId);
  if (!transcript) {
    throw new TranscriptNotFoundError(videoId);
  }
  return transcript;
}

export async function searchTranscript(
  deps: SearchDeps,
  videoId: string,
  keyword: string,
  options: SearchOptions
): Promise<SearchResult> {
  if (!keyword.trim()) {
    debug('search.empty', { videoId });
    return { keyword, matches: [], totalMatches: 0 };
  }

  const transcript = await lookupTranscript(deps, videoId);
  const matches = findMatches(transcript, keyword, { mode: options.mode }).map((m) => {
    const range = resolveRange(m, options.policy, { durationSec: options.durationSec });
    return {
      ...m,
      range,
      startLabel: formatTimestamp(range.start),
      endLabel: formatTimestamp(range.end),
    };
  });
  info('search.complete', { videoId, keyword, mode: options.mode ?? 'span', matches: matches.length });
  return { keyword, matches, totalMatches: matches.length };
}

import type { MatchMode } from './env';
import type { Match, Segment, Transcript, WordTimestamp } from './types';

export interface MatchOptions {
  /**
   * `span` joins consecutive tokens and requires the join to equal the query;
   * `token` reports every single token that contains the query.
   */
  mode?: MatchMode;
}

/**
 * Comparison form of a token or query: surrounding whitespace trimmed,
 * lower-cased. Inner spacing is kept, so a spaced query never equals a
 * join of tokens.
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Every occurrence of `query` in the transcript, in chronological order
 * (segment index, then first token index). Blank query yields [].
 */
export function findMatches(transcript: Transcript, query: string, options: MatchOptions = {}): Match[] {
  const needle = normalizeText(query);
  if (!needle) return [];

  const mode = options.mode ?? 'span';
  const matches: Match[] = [];
  transcript.segments.forEach((segment, segmentIndex) => {
    if (segment.words.length === 0) return;
    const found = mode === 'token' ? matchTokens(segment, needle) : matchSpans(segment, needle);
    for (const [first, last] of found) {
      matches.push(toMatch(segment, segmentIndex, first, last));
    }
  });
  return matches;
}

/** [first, last] token index pairs, inclusive, ordered by `first`. */
type TokenSpan = [number, number];

function matchSpans(segment: Segment, needle: string): TokenSpan[] {
  const tokens = segment.words.map((w) => normalizeText(w.text));
  // Any span join is a substring of the full join, so a miss here rules out the whole segment.
  if (!tokens.join('').includes(needle)) return [];

  const spans: TokenSpan[] = [];
  for (let i = 0; i < tokens.length; i++) {
    let joined = '';
    for (let j = i; j < tokens.length; j++) {
      joined += tokens[j];
      if (joined === needle) {
        // shortest span wins for this start token
        spans.push([i, j]);
        break;
      }
      if (joined.length >= needle.length || !needle.startsWith(joined)) break;
    }
  }
  return spans;
}

function matchTokens(segment: Segment, needle: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  segment.words.forEach((w, i) => {
    if (normalizeText(w.text).includes(needle)) spans.push([i, i]);
  });
  return spans;
}

function toMatch(segment: Segment, segmentIndex: number, first: number, last: number): Match {
  const words: readonly WordTimestamp[] = segment.words.slice(first, last + 1);
  return {
    matchedText: words.map((w) => w.text.trim()).join(''),
    start: words[0].start,
    end: words[words.length - 1].end,
    context: segment.text,
    segmentIndex,
  };
}

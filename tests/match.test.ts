import { describe, expect, it } from 'vitest';
import { findMatches, normalizeText } from '../src/pipeline/match';
import { greetingTranscript, segment, transcript, word } from './helpers';

describe('normalizeText', () => {
  it('lower-cases and trims surrounding whitespace only', () => {
    expect(normalizeText(' Hello World ')).toBe('hello world');
    expect(normalizeText('\tWorld\n')).toBe('world');
    expect(normalizeText('ÄBC')).toBe('äbc');
  });
});

describe('findMatches', () => {
  const abc = transcript([segment([word('w1', 0.0, 0.5), word('w2', 0.5, 1.2), word('w3', 1.2, 2.0)], 'w1 w2 w3')]);

  it('returns nothing for an empty or blank query', () => {
    expect(findMatches(abc, '')).toEqual([]);
    expect(findMatches(abc, '   ')).toEqual([]);
    expect(findMatches(abc, '\t\n')).toEqual([]);
  });

  it('joins consecutive tokens into one match', () => {
    expect(findMatches(abc, 'w1w2')).toEqual([
      { matchedText: 'w1w2', start: 0.0, end: 1.2, context: 'w1 w2 w3', segmentIndex: 0 },
    ]);
  });

  it('does not match a query with inner spacing against joined tokens', () => {
    expect(findMatches(abc, 'w2 w3')).toEqual([]);
    expect(findMatches(abc, ' w2 w3 ')).toEqual([]);
  });

  it('trims the query before matching', () => {
    expect(findMatches(abc, ' w2w3 ')).toEqual([
      { matchedText: 'w2w3', start: 0.5, end: 2.0, context: 'w1 w2 w3', segmentIndex: 0 },
    ]);
  });

  it('records the shortest span for each start token', () => {
    const t = transcript([segment([word('a', 0, 1), word('b', 1, 2), word('c', 2, 3)])]);
    const matches = findMatches(t, 'a');
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ matchedText: 'a', start: 0, end: 1 });
  });

  it('keeps overlapping matches that start at different tokens', () => {
    const t = transcript([segment([word('a', 0, 1), word('a', 1, 2), word('a', 2, 3)])]);
    expect(findMatches(t, 'aa').map((m) => [m.start, m.end])).toEqual([
      [0, 2],
      [1, 3],
    ]);
  });

  it('reports every occurrence within a segment in token order', () => {
    const t = transcript([segment([word('a', 0, 1), word('b', 1, 2), word('x', 2, 3), word('a', 3, 4), word('b', 4, 5)])]);
    expect(findMatches(t, 'ab').map((m) => [m.start, m.end])).toEqual([
      [0, 2],
      [3, 5],
    ]);
  });

  it('compares case-insensitively and keeps the original casing', () => {
    const t = transcript([segment([word(' Hello', 0, 0.4), word(' World', 0.4, 0.9)], ' Hello World')]);
    expect(findMatches(t, 'HELLO world')).toEqual([]);
    expect(findMatches(t, 'HELLOworld')).toEqual([
      { matchedText: 'HelloWorld', start: 0, end: 0.9, context: ' Hello World', segmentIndex: 0 },
    ]);
  });

  it('finds a phrase whether it is one token or split across tokens', () => {
    const matches = findMatches(greetingTranscript(), 'こんにちは');
    expect(matches).toEqual([
      { matchedText: 'こんにちは', start: 1.0, end: 1.8, context: 'こんにちは世界', segmentIndex: 0 },
      { matchedText: 'こんにちは', start: 10.0, end: 10.9, context: 'はい、こんにちは', segmentIndex: 1 },
    ]);
  });

  it('does not rely on the display text containing the phrase', () => {
    const t = transcript([segment([word('こん', 3.0, 3.2), word('にちは', 3.2, 3.7)], '[音楽] こん・にちは')]);
    expect(findMatches(t, 'こんにちは')).toHaveLength(1);
  });

  it('skips segments without words', () => {
    const t = transcript([
      { start: 0, end: 5, text: 'こんにちは', words: [] },
      segment([word('こんにちは', 6, 7)]),
    ]);
    expect(findMatches(t, 'こんにちは')).toEqual([
      { matchedText: 'こんにちは', start: 6, end: 7, context: 'こんにちは', segmentIndex: 1 },
    ]);
  });

  it('lets a whitespace-only token start a match that runs into the next token', () => {
    const t = transcript([segment([word(' ', 0, 0.1), word('a', 0.1, 0.5)])]);
    expect(findMatches(t, 'a').map((m) => [m.start, m.end])).toEqual([
      [0, 0.5],
      [0.1, 0.5],
    ]);
  });

  it('returns nothing when the phrase is absent', () => {
    expect(findMatches(greetingTranscript(), 'さようなら')).toEqual([]);
  });

  it('gives the same ordered output on repeated calls', () => {
    const t = greetingTranscript();
    expect(findMatches(t, 'こんにちは')).toEqual(findMatches(t, 'こんにちは'));
  });

  describe('token mode', () => {
    it('reports single tokens that contain the query', () => {
      const t = transcript([segment([word('東京都', 0, 0.8), word('大阪', 0.8, 1.5), word('東京', 2, 2.6)])]);
      expect(findMatches(t, '東京', { mode: 'token' })).toEqual([
        { matchedText: '東京都', start: 0, end: 0.8, context: '東京都大阪東京', segmentIndex: 0 },
        { matchedText: '東京', start: 2, end: 2.6, context: '東京都大阪東京', segmentIndex: 0 },
      ]);
    });

    it('does not join tokens', () => {
      expect(findMatches(greetingTranscript(), 'こんにちは', { mode: 'token' }).map((m) => m.segmentIndex)).toEqual([0]);
    });
  });
});

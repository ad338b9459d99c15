import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { Segment, Transcript, WordTimestamp } from '../src/pipeline/types';

export function word(text: string, start: number, end: number, confidence = 0.9): WordTimestamp {
  return { text, start, end, confidence };
}

export function segment(words: WordTimestamp[], text?: string): Segment {
  return {
    start: words.length ? words[0].start : 0,
    end: words.length ? words[words.length - 1].end : 0,
    text: text ?? words.map((w) => w.text).join(''),
    words,
  };
}

export function transcript(segments: Segment[], videoId = 'video-a'): Transcript {
  return { videoId, segments, language: 'ja', createdAt: '2026-01-01T00:00:00.000Z' };
}

/** Two segments holding "こんにちは" once as one token and once split in two. */
export function greetingTranscript(videoId = 'video-a'): Transcript {
  return transcript(
    [
      segment([word('こんにちは', 1.0, 1.8), word('世界', 1.8, 2.4)], 'こんにちは世界'),
      segment([word('はい', 9.5, 10.0), word('こん', 10.0, 10.3), word('にちは', 10.3, 10.9)], 'はい、こんにちは'),
    ],
    videoId
  );
}

export async function tempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `clipfinder-${prefix}-`));
}

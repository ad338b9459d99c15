import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { InvalidTranscriptError } from './errors';
import { debug, info } from './log';
import type { Segment, Transcript, TranscriptJson } from './types';

export const WordJsonSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  probability: z.number(),
});

export const SegmentJsonSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
  words: z.array(WordJsonSchema).default([]),
});

export const TranscriptJsonSchema = z.object({
  video_id: z.string().min(1),
  segments: z.array(SegmentJsonSchema),
  language: z.string(),
  created_at: z.string(),
});

export function wordCount(segment: Segment): number {
  return segment.words.length;
}

export function parseTranscript(json: unknown, source?: string): Transcript {
  const parsed = TranscriptJsonSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidTranscriptError(`${issue?.message ?? 'unexpected shape'}${where}`, source);
  }
  const data = parsed.data;
  return {
    videoId: data.video_id,
    language: data.language,
    createdAt: data.created_at,
    segments: data.segments.map((s) => ({
      start: s.start,
      end: s.end,
      text: s.text,
      words: s.words.map((w) => ({
        text: w.word,
        start: w.start,
        end: w.end,
        confidence: w.probability,
      })),
    })),
  };
}

export function toTranscriptJson(transcript: Transcript): TranscriptJson {
  return {
    video_id: transcript.videoId,
    language: transcript.language,
    created_at: transcript.createdAt,
    segments: transcript.segments.map((s) => ({
      start: s.start,
      end: s.end,
      text: s.text,
      words: s.words.map((w) => ({
        word: w.text,
        start: w.start,
        end: w.end,
        probability: w.confidence,
      })),
    })),
  };
}

/**
 * Transcripts persisted as `<dir>/<videoId>.json`. A save replaces any
 * earlier transcript of the same video.
 */
export class TranscriptStore {
  constructor(readonly dir: string) {}

  pathFor(videoId: string): string {
    return path.resolve(this.dir, `${videoId}.json`);
  }

  async has(videoId: string): Promise<boolean> {
    return fs.pathExists(this.pathFor(videoId));
  }

  async save(transcript: Transcript): Promise<string> {
    await fs.ensureDir(this.dir);
    const file = this.pathFor(transcript.videoId);
    await fs.writeJson(file, toTranscriptJson(transcript), { spaces: 2 });
    info('transcript.save', { videoId: transcript.videoId, segments: transcript.segments.length, path: file });
    return file;
  }

  async load(videoId: string): Promise<Transcript | null> {
    const file = this.pathFor(videoId);
    if (!(await fs.pathExists(file))) {
      debug('transcript.load.miss', { videoId, path: file });
      return null;
    }
    const json: unknown = await fs.readJson(file);
    return parseTranscript(json, file);
  }
}

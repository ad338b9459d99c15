import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { InvalidTranscriptError } from './errors';
import { newVideoId } from './ids';
import { debug, info, startStep, warn } from './log';
import { SegmentJsonSchema } from './transcript';
import type { Transcript } from './types';

/** Turns a media file into a word-timestamped transcript. */
export interface TranscriptionEngine {
    transcribe(videoId: string, mediaPath: string, language: string): Promise<Transcript>;
}

export interface WhisperCommandOptions {
    whisperBin: string;
    /** When set, `whisperBin` runs inside this docker image. */
    whisperImage?: string;
    dockerBin?: string;
    ffmpegBin?: string;
    tempDir: string;
    modelSize: string;
    device: string;
}

const WhisperOutputSchema = z.object({
    language: z.string().optional(),
    segments: z.array(SegmentJsonSchema),
});

/**
 * Runs an external faster-whisper style CLI with word timestamps enabled.
 * Built once at startup and passed to whoever needs it.
 */
export class WhisperCommandEngine implements TranscriptionEngine {
    constructor(private readonly opts: WhisperCommandOptions) {}

    async transcribe(videoId: string, mediaPath: string, language: string): Promise<Transcript> {
        const workId = newVideoId();
        const audioPath = path.resolve(this.opts.tempDir, `${workId}.wav`);
        const outPath = path.resolve(this.opts.tempDir, `${workId}.json`);
        await fs.ensureDir(this.opts.tempDir);
        try {
            await this.extractAudio(mediaPath, audioPath);
            await this.runWhisper(videoId, audioPath, outPath, language);
            const json: unknown = await fs.readJson(outPath);
            const parsed = WhisperOutputSchema.safeParse(json);
            if (!parsed.success) {
                throw new InvalidTranscriptError(parsed.error.issues[0]?.message ?? 'unexpected shape', outPath);
            }
            const transcript: Transcript = {
                videoId,
                language: parsed.data.language || language,
                createdAt: new Date().toISOString(),
                segments: parsed.data.segments.map((s) => ({
                    start: s.start,
                    end: s.end,
                    text: s.text,
                    words: s.words.map((w) => ({ text: w.word, start: w.start, end: w.end, confidence: w.probability })),
                })),
            };
            info('transcribe.complete', { videoId, segments: transcript.segments.length, language: transcript.language });
            return transcript;
        } finally {
            await fs.remove(audioPath);
            await fs.remove(outPath);
        }
    }

    private async extractAudio(mediaPath: string, audioPath: string) {
        const timer = startStep('transcribe.audio', { mediaPath });
        // 16 kHz mono is what the recogniser expects
        await execa(this.opts.ffmpegBin || 'ffmpeg', [
            '-y',
            '-loglevel',
            'error',
            '-nostdin',
            '-i',
            mediaPath,
            '-vn',
            '-ac',
            '1',
            '-ar',
            '16000',
            audioPath,
        ]);
        timer.end();
    }

    private async runWhisper(videoId: string, audioPath: string, outPath: string, language: string) {
        const toolArgs = [
            audioPath,
            outPath,
            '--language',
            language,
            '--model',
            this.opts.modelSize,
            '--device',
            this.opts.device,
            '--word-timestamps',
        ];
        let cmd = this.opts.whisperBin;
        let args = toolArgs;
        if (this.opts.whisperImage) {
            const dir = path.resolve(this.opts.tempDir);
            cmd = this.opts.dockerBin || 'docker';
            args = ['run', '--rm', '-v', `${dir}:${dir}`, this.opts.whisperImage, ...toolArgs];
        }
        const timer = startStep('transcribe.whisper', { videoId, cmd, model: this.opts.modelSize });
        try {
            const proc = execa(cmd, args, { all: true });
            proc.all?.on('data', (d: Buffer) => {
                const line = d.toString().trim();
                if (line) debug('transcribe.whisper.log', { videoId, line });
            });
            await proc;
        } catch (e) {
            const stderr =
                typeof e === 'object' && e !== null && 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
            warn('transcribe.whisper.fail', { videoId, stderrSnippet: stderr.slice(-400) });
            throw e;
        }
        timer.end();
    }
}

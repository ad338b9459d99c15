import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { InvalidRangeError, MediaNotFoundError, TrimFailureError } from './errors';
import { findMedia } from './ingest';
import { info, startStep, warn } from './log';
import type { ClipRange } from './types';

/** Cuts [start, end) out of a media file without re-encoding, or fails. */
export interface MediaTrimmer {
    trim(inputPath: string, range: ClipRange, outputPath: string): Promise<string>;
}

export function validateClipRange(start: number, end: number): ClipRange {
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
        throw new InvalidRangeError(start, end, 'start and end must be numbers');
    }
    if (start < 0) {
        throw new InvalidRangeError(start, end, 'start must not be negative');
    }
    if (end <= start) {
        throw new InvalidRangeError(start, end, 'end must be after start');
    }
    return { start, end };
}

function processFailure(e: unknown): { diagnostic: string; exitCode?: number } {
    if (typeof e !== 'object' || e === null) return { diagnostic: String(e) };
    const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr.trim() : '';
    const shortMessage = 'shortMessage' in e && typeof e.shortMessage === 'string' ? e.shortMessage : '';
    const exitCode = 'exitCode' in e && typeof e.exitCode === 'number' ? e.exitCode : undefined;
    const message = e instanceof Error ? e.message : String(e);
    return { diagnostic: stderr || shortMessage || message, exitCode };
}

export class FfmpegTrimmer implements MediaTrimmer {
    constructor(private readonly ffmpegBin = 'ffmpeg') {}

    async trim(inputPath: string, range: ClipRange, outputPath: string): Promise<string> {
        await fs.ensureDir(path.dirname(outputPath));
        const timer = startStep('trim', { input: inputPath, start: range.start, end: range.end });
        try {
            await execa(this.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                inputPath,
                '-ss',
                String(range.start),
                '-to',
                String(range.end),
                '-c',
                'copy',
                outputPath,
            ]);
        } catch (e) {
            const { diagnostic, exitCode } = processFailure(e);
            warn('trim.fail', { input: inputPath, exitCode, stderrSnippet: diagnostic.slice(-400) });
            throw new TrimFailureError('ffmpeg failed to trim media', diagnostic, exitCode);
        }

        // ffmpeg can exit 0 without writing anything
        const stat = await fs.stat(outputPath).catch((e: unknown) => {
            const msg = e instanceof Error ? e.message : String(e);
            warn('trim.fail', { input: inputPath, output: outputPath, error: msg });
            throw new TrimFailureError('ffmpeg produced no clip', msg);
        });
        if (stat.size === 0) {
            throw new TrimFailureError(
                'ffmpeg produced an empty clip',
                `no samples in [${range.start}, ${range.end}) of ${inputPath}`
            );
        }
        timer.end({ output: outputPath, bytes: stat.size });
        return outputPath;
    }
}

export interface ClipDeps {
    trimmer: MediaTrimmer;
    uploadDir: string;
    outputDir: string;
    allowedExtensions: readonly string[];
}

export function clipFileName(videoId: string, range: ClipRange, ext: string): string {
    return `${videoId}_${range.start.toFixed(2)}-${range.end.toFixed(2)}${ext}`;
}

/**
 * Validate a requested range and hand it to the trimmer. Nothing is
 * delegated for an invalid range.
 */
export async function requestClip(deps: ClipDeps, videoId: string, start: number, end: number): Promise<string> {
    const range = validateClipRange(start, end);
    const inputPath = await findMedia(deps.uploadDir, videoId, deps.allowedExtensions);
    if (!inputPath) {
        throw new MediaNotFoundError(videoId);
    }
    const outputPath = path.resolve(deps.outputDir, clipFileName(videoId, range, path.extname(inputPath)));
    await deps.trimmer.trim(inputPath, range, outputPath);
    info('clip.complete', { videoId, start: range.start, end: range.end, path: outputPath });
    return outputPath;
}

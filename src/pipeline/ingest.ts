import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { MediaTooLargeError, UnsupportedMediaError } from './errors';
import { newVideoId } from './ids';
import { info, warn } from './log';
import type { MediaRecord } from './types';

export interface IngestOptions {
    uploadDir: string;
    allowedExtensions: readonly string[];
    maxFileSizeBytes: number;
    ffprobeBin?: string;
}

const FfprobeFormatSchema = z.object({
    format: z.object({ duration: z.union([z.string(), z.number()]).optional() }).optional(),
});

/**
 * Copy a media file into the upload directory under a fresh video ID.
 */
export async function ingestMedia(sourcePath: string, opts: IngestOptions): Promise<MediaRecord> {
    const filename = path.basename(sourcePath);
    const ext = path.extname(filename).toLowerCase();
    if (!opts.allowedExtensions.includes(ext)) {
        throw new UnsupportedMediaError(filename, opts.allowedExtensions);
    }

    // Nothing is written for an oversize source
    const { size } = await fs.stat(sourcePath);
    if (size > opts.maxFileSizeBytes) {
        throw new MediaTooLargeError(size, opts.maxFileSizeBytes);
    }

    const videoId = newVideoId();
    // Absolute path so later ffmpeg/docker invocations do not depend on cwd
    const filePath = path.resolve(opts.uploadDir, `${videoId}${ext}`);
    await fs.ensureDir(opts.uploadDir);
    await fs.copy(sourcePath, filePath);
    info('ingest.copy', { videoId, from: sourcePath, to: filePath });

    const durationSec = await probeDuration(filePath, opts.ffprobeBin);
    return {
        videoId,
        filename,
        filePath,
        uploadedAt: new Date().toISOString(),
        sizeBytes: size,
        durationSec,
    };
}

/**
 * Media duration in seconds via ffprobe; undefined when it cannot be determined.
 */
export async function probeDuration(mediaPath: string, ffprobeBin = 'ffprobe'): Promise<number | undefined> {
    let stdout: string;
    try {
        const res = await execa(ffprobeBin, ['-v', 'quiet', '-print_format', 'json', '-show_format', mediaPath]);
        stdout = res.stdout;
    } catch (e) {
        warn('ingest.probe.fail', { path: mediaPath, error: e instanceof Error ? e.message : String(e) });
        return undefined;
    }
    let json: unknown;
    try {
        json = JSON.parse(stdout);
    } catch {
        warn('ingest.probe.badJson', { path: mediaPath, stdoutSnippet: stdout.slice(0, 200) });
        return undefined;
    }
    const parsed = FfprobeFormatSchema.safeParse(json);
    const raw = parsed.success ? parsed.data.format?.duration : undefined;
    const duration = raw === undefined ? NaN : Number(raw);
    return Number.isFinite(duration) ? duration : undefined;
}

/**
 * Locate the uploaded file for a video ID by trying each allowed extension.
 */
export async function findMedia(
    uploadDir: string,
    videoId: string,
    extensions: readonly string[]
): Promise<string | null> {
    for (const ext of extensions) {
        const candidate = path.resolve(uploadDir, `${videoId}${ext}`);
        if (await fs.pathExists(candidate)) return candidate;
    }
    return null;
}

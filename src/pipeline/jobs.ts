import { debug, error, info, startStep, warn } from './log';
import type { TranscriptionEngine } from './transcribe';
import type { TranscriptStore } from './transcript';
import type { JobRecord } from './types';

/** Where job records live: in memory, or a database table (see run_db.ts). */
export interface JobStore {
  get(videoId: string): Promise<JobRecord | undefined>;
  put(record: JobRecord): Promise<void>;
}

export class MemoryJobStore implements JobStore {
  private readonly records = new Map<string, JobRecord>();

  async get(videoId: string): Promise<JobRecord | undefined> {
    return this.records.get(videoId);
  }

  async put(record: JobRecord): Promise<void> {
    this.records.set(record.videoId, record);
  }
}

interface ActiveJob {
  accepted: Promise<JobRecord>;
  finished: Promise<JobRecord>;
}

function now() {
  return new Date().toISOString();
}

function reasonOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Background transcription jobs keyed by video ID. At most one job per ID is
 * in flight; a second submit while one runs returns the current record.
 */
export class JobRegistry {
  private readonly active = new Map<string, ActiveJob>();

  constructor(
    private readonly engine: TranscriptionEngine,
    private readonly transcripts: TranscriptStore,
    private readonly store: JobStore
  ) {}

  async submit(videoId: string, mediaPath: string, language: string): Promise<JobRecord> {
    const existing = this.active.get(videoId);
    if (existing) {
      const accepted = await existing.accepted;
      debug('transcribe.job.inflight', { videoId });
      return (await this.store.get(videoId)) ?? accepted;
    }

    const pending: JobRecord = { videoId, mediaPath, status: 'pending', updatedAt: now() };
    const accepted = this.store.put(pending).then(() => pending);
    const finished = accepted
      .then(
        () => this.execute(pending, language),
        (e: unknown) => this.fail(pending, e)
      )
      .finally(() => {
        this.active.delete(videoId);
      });
    this.active.set(videoId, { accepted, finished });
    info('transcribe.job.submit', { videoId, mediaPath, language });
    return accepted;
  }

  async status(videoId: string): Promise<JobRecord | undefined> {
    return this.store.get(videoId);
  }

  /** Resolves once the job for `videoId` has left pending/running. */
  async wait(videoId: string): Promise<JobRecord | undefined> {
    const job = this.active.get(videoId);
    if (job) return job.finished;
    return this.store.get(videoId);
  }

  private async execute(pending: JobRecord, language: string): Promise<JobRecord> {
    const { videoId, mediaPath } = pending;
    const timer = startStep('transcribe.job', { videoId });
    try {
      await this.store.put({ videoId, mediaPath, status: 'running', updatedAt: now() });
      const transcript = await this.engine.transcribe(videoId, mediaPath, language);
      const transcriptPath = await this.transcripts.save(transcript);
      const done: JobRecord = {
        videoId,
        mediaPath,
        status: 'done',
        transcriptPath,
        segmentCount: transcript.segments.length,
        updatedAt: now(),
      };
      await this.store.put(done);
      timer.end({ segments: done.segmentCount });
      return done;
    } catch (e) {
      return this.fail(pending, e);
    }
  }

  private async fail(pending: JobRecord, e: unknown): Promise<JobRecord> {
    const failed: JobRecord = {
      videoId: pending.videoId,
      mediaPath: pending.mediaPath,
      status: 'failed',
      reason: reasonOf(e),
      updatedAt: now(),
    };
    warn('transcribe.job.fail', { videoId: failed.videoId, reason: failed.reason });
    try {
      await this.store.put(failed);
    } catch (storeError) {
      error('transcribe.job.record.fail', { videoId: failed.videoId, error: reasonOf(storeError) });
    }
    return failed;
  }
}

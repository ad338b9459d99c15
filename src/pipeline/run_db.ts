import { Client } from 'pg';
import type { JobStore } from './jobs';
import { debug, warn } from './log';
import type { JobRecord } from './types';

export interface JobRow {
  video_id: string;
  status: string;
  media_path: string;
  transcript_path: string | null;
  segment_count: number | null;
  reason: string | null;
  updated_at: Date | string;
}

export async function withPg<T>(databaseUrl: string, fn: (c: Client) => Promise<T>): Promise<T> {
  const client = new Client({ connectionString: databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    warn('db.connect.fail', { url: redactUrl(databaseUrl), error: msg });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try {
      await client.end();
    } catch (e) {
      debug('db.end.fail', { error: e instanceof Error ? e.message : String(e) });
    }
  }
}

export function redactUrl(databaseUrl: string): string {
  return databaseUrl.replace(/:[^:@/]+@/, ':***@');
}

export function rowToRecord(row: JobRow): JobRecord {
  const base = {
    videoId: row.video_id,
    mediaPath: row.media_path,
    updatedAt: row.updated_at instanceof Date ? row.updated_at.toISOString() : row.updated_at,
  };
  switch (row.status) {
    case 'pending':
      return { ...base, status: 'pending' };
    case 'running':
      return { ...base, status: 'running' };
    case 'done':
      return { ...base, status: 'done', transcriptPath: row.transcript_path ?? '', segmentCount: row.segment_count ?? 0 };
    case 'failed':
      return { ...base, status: 'failed', reason: row.reason ?? 'unknown error' };
    default:
      throw new Error(`Unknown job status "${row.status}" for video ${row.video_id}`);
  }
}

export function recordToParams(record: JobRecord): unknown[] {
  return [
    record.videoId,
    record.status,
    record.mediaPath,
    record.status === 'done' ? record.transcriptPath : null,
    record.status === 'done' ? record.segmentCount : null,
    record.status === 'failed' ? record.reason : null,
    record.updatedAt,
  ];
}

/**
 * Job records in the `transcription_jobs` table, one row per video,
 * so other processes can see the status of a running transcription.
 */
export class PgJobStore implements JobStore {
  constructor(private readonly databaseUrl: string) {}

  async get(videoId: string): Promise<JobRecord | undefined> {
    return withPg(this.databaseUrl, async (c) => {
      const res = await c.query<JobRow>(
        `SELECT video_id, status, media_path, transcript_path, segment_count, reason, updated_at
         FROM transcription_jobs WHERE video_id = $1`,
        [videoId]
      );
      const row = res.rows[0];
      return row ? rowToRecord(row) : undefined;
    });
  }

  async put(record: JobRecord): Promise<void> {
    await withPg(this.databaseUrl, async (c) => {
      await c.query(
        `INSERT INTO transcription_jobs (video_id, status, media_path, transcript_path, segment_count, reason, updated_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7)
         ON CONFLICT (video_id) DO UPDATE SET
           status = EXCLUDED.status,
           media_path = EXCLUDED.media_path,
           transcript_path = EXCLUDED.transcript_path,
           segment_count = EXCLUDED.segment_count,
           reason = EXCLUDED.reason,
           updated_at = EXCLUDED.updated_at`,
        recordToParams(record)
      );
    });
  }
}

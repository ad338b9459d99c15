import { randomUUID } from 'crypto';
import path from 'path';

export function newVideoId(): string {
  return randomUUID();
}

export function toVideoId(videoOrPath: string): string {
  // Accepts an uploaded file path (uploads/<id>.mp4) or returns the input if it looks like an ID
  const base = path.basename(videoOrPath.trim());
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

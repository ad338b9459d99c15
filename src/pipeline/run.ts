import path from 'path';
import type { Env } from './env';
import { JobRegistry, MemoryJobStore, type JobStore } from './jobs';
import { info } from './log';
import { policyFromConfig, type ClipPolicy } from './range';
import { PgJobStore, redactUrl } from './run_db';
import { WhisperCommandEngine, type TranscriptionEngine } from './transcribe';
import { TranscriptStore } from './transcript';
import { FfmpegTrimmer, type MediaTrimmer } from './trim';

export interface Services {
  env: Env;
  engine: TranscriptionEngine;
  transcripts: TranscriptStore;
  jobs: JobStore;
  registry: JobRegistry;
  trimmer: MediaTrimmer;
  policy: ClipPolicy;
}

/**
 * Build every long-lived collaborator once. Commands receive the result
 * instead of reaching for module-level singletons.
 */
export function createServices(env: Env): Services {
  const engine = new WhisperCommandEngine({
    whisperBin: env.whisperBin,
    whisperImage: env.whisperImage,
    dockerBin: env.dockerBin,
    ffmpegBin: env.ffmpegBin,
    tempDir: env.tempDir,
    modelSize: env.whisperModelSize,
    device: env.whisperDevice,
  });
  const transcripts = new TranscriptStore(env.transcriptDir);
  const jobs: JobStore = env.disableDb ? new MemoryJobStore() : new PgJobStore(env.databaseUrl);
  const registry = new JobRegistry(engine, transcripts, jobs);
  info('services.init', {
    model: env.whisperModelSize,
    device: env.whisperDevice,
    image: env.whisperImage || undefined,
    jobs: env.disableDb ? 'memory' : redactUrl(env.databaseUrl),
    transcripts: path.resolve(env.transcriptDir),
  });
  return {
    env,
    engine,
    transcripts,
    jobs,
    registry,
    trimmer: new FfmpegTrimmer(env.ffmpegBin),
    policy: policyFromConfig(env.clipPolicy, env.clipPaddingSec),
  };
}

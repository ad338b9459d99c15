import { describe, expect, it } from 'vitest';
import { loadEnv } from '../src/pipeline/env';
import { ConfigError } from '../src/pipeline/errors';

describe('loadEnv', () => {
  it('falls back to defaults', () => {
    const env = loadEnv({});
    expect(env.uploadDir).toBe('uploads');
    expect(env.transcriptDir).toBe('transcripts');
    expect(env.maxFileSizeBytes).toBe(500 * 1024 * 1024);
    expect(env.allowedExtensions).toEqual(['.mp4', '.mov', '.avi', '.mkv', '.webm']);
    expect(env.matchMode).toBe('span');
    expect(env.clipPolicy).toBe('exact');
    expect(env.clipPaddingSec).toBe(2);
    expect(env.whisperModelSize).toBe('base');
    expect(env.disableDb).toBe(true);
  });

  it('reads overrides', () => {
    const env = loadEnv({
      ALLOWED_EXTENSIONS: ' .MP4 , .mkv,',
      MATCH_MODE: 'token',
      CLIP_POLICY: 'padded',
      CLIP_PADDING_SEC: '1.5',
      DISABLE_DB: 'FALSE',
    });
    expect(env.allowedExtensions).toEqual(['.mp4', '.mkv']);
    expect(env.matchMode).toBe('token');
    expect(env.clipPolicy).toBe('padded');
    expect(env.clipPaddingSec).toBe(1.5);
    expect(env.disableDb).toBe(false);
  });

  it('fails fast on values it does not know', () => {
    expect(() => loadEnv({ MATCH_MODE: 'fuzzy' })).toThrow(ConfigError);
    expect(() => loadEnv({ WHISPER_DEVICE: 'tpu' })).toThrow(/WHISPER_DEVICE=tpu/);
    expect(() => loadEnv({ CLIP_PADDING_SEC: 'two' })).toThrow('CLIP_PADDING_SEC=two is not a number');
  });
});

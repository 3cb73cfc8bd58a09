/**
 * Configuration for the track pipeline
 * Reads and validates environment variables with sensible defaults
 */

import path from 'path';
import { ConfigError } from '../lib/errors';
import { redactSensitiveData } from '../lib/logger';

export const AUDIO_FORMATS = ['wav', 'mp3', 'm4a', 'flac', 'opus'] as const;
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export interface PipelineConfig {
  /** Track or playlist page to process */
  url: string;
  /** Treat `url` as a playlist and process every entry */
  isPlaylist: boolean;
  /** PostgreSQL connection string */
  databaseUrl: string;
  /** Directory for downloaded audio, one file per track id */
  audioDir: string;
  /** Directory for cached transcripts (JSON + plain text), one pair per track id */
  transcriptDir: string;
  /** Cache transcripts on disk and reuse them on later runs */
  persistTranscripts: boolean;
  /** Container the fetch engine extracts audio into */
  audioFormat: AudioFormat;
  /** Keep processing sibling tracks after one track fails */
  continueOnError: boolean;
  /** Tracks processed in parallel (1 = sequential, source order) */
  concurrency: number;
  /** Per-track deadline in milliseconds, 0 disables it */
  trackTimeoutMs: number;
  /** Hold a PostgreSQL advisory lock for the duration of a run */
  useAdvisoryLock: boolean;
  /** yt-dlp binary used for discovery and download */
  ytDlpPath: string;
  /** Deepgram API key */
  deepgramApiKey: string;
  /** Deepgram model used for recognition */
  deepgramModel: string;
  /** Language hint for recognition; detected when null */
  language: string | null;
}

type Env = Record<string, string | undefined>;

/**
 * Parse and validate pipeline configuration from environment variables
 * @param env - Variables to read (process.env by default)
 * @returns Validated configuration object
 * @throws ConfigError if validation fails
 */
export function getPipelineConfig(env: Env = process.env): PipelineConfig {
  const url = (env.TRACK_URL || '').trim();
  if (!url) {
    throw new ConfigError('TRACK_URL is required.');
  }
  if (!isHttpUrl(url)) {
    throw new ConfigError(`Invalid TRACK_URL: "${url}". Must be an http(s) URL.`);
  }

  const databaseUrl = (env.DATABASE_URL || '').trim();
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL is required.');
  }
  if (!/^postgres(ql)?:\/\//.test(databaseUrl)) {
    throw new ConfigError('Invalid DATABASE_URL: must start with postgres:// or postgresql://.');
  }

  const deepgramApiKey = (env.DEEPGRAM_API_KEY || '').trim();
  if (!deepgramApiKey) {
    throw new ConfigError('DEEPGRAM_API_KEY is required.');
  }

  const tmpDir = path.resolve(env.TMP_DIR || path.join(process.cwd(), 'tmp'));
  const audioDir = path.resolve(env.AUDIO_DIR || path.join(tmpDir, 'audio'));
  const transcriptDir = path.resolve(env.TRANSCRIPT_DIR || path.join(tmpDir, 'transcripts'));
  if (audioDir === transcriptDir) {
    throw new ConfigError('AUDIO_DIR and TRANSCRIPT_DIR must be different directories.');
  }

  const audioFormatString = (env.AUDIO_FORMAT || 'wav').toLowerCase();
  if (!isAudioFormat(audioFormatString)) {
    throw new ConfigError(`Invalid AUDIO_FORMAT: "${env.AUDIO_FORMAT}". Must be one of: ${AUDIO_FORMATS.join(', ')}`);
  }

  const concurrency = parseInt(env.PIPELINE_CONCURRENCY || '1', 10);
  if (isNaN(concurrency) || concurrency < 1 || concurrency > 16) {
    throw new ConfigError(`Invalid PIPELINE_CONCURRENCY: "${env.PIPELINE_CONCURRENCY}". Must be a number between 1 and 16.`);
  }

  const trackTimeoutMs = parseInt(env.TRACK_TIMEOUT_MS || '0', 10);
  if (isNaN(trackTimeoutMs) || (trackTimeoutMs !== 0 && (trackTimeoutMs < 1000 || trackTimeoutMs > 86_400_000))) {
    throw new ConfigError(`Invalid TRACK_TIMEOUT_MS: "${env.TRACK_TIMEOUT_MS}". Must be 0 or a number between 1000 and 86400000.`);
  }

  const deepgramModel = (env.DEEPGRAM_MODEL || 'nova-3').trim();
  const language = env.TRANSCRIBE_LANGUAGE?.trim() || null;

  return {
    url,
    isPlaylist: parseFlag(env, 'IS_PLAYLIST', false),
    databaseUrl,
    audioDir,
    transcriptDir,
    persistTranscripts: parseFlag(env, 'PERSIST_TRANSCRIPTS', true),
    audioFormat: audioFormatString,
    continueOnError: parseFlag(env, 'CONTINUE_ON_ERROR', false),
    concurrency,
    trackTimeoutMs,
    useAdvisoryLock: parseFlag(env, 'PIPELINE_ADVISORY_LOCK', true),
    ytDlpPath: env.YTDLP_PATH?.trim() || 'yt-dlp',
    deepgramApiKey,
    deepgramModel,
    language,
  };
}

/**
 * Boolean flags accept true/false, 1/0 and yes/no; anything else is rejected
 */
function parseFlag(env: Env, name: string, defaultValue: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigError(`Invalid ${name}: "${raw}". Must be true or false.`);
}

function isAudioFormat(value: string): value is AudioFormat {
  return (AUDIO_FORMATS as readonly string[]).includes(value);
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Get a human-readable summary of the current configuration
 * Useful for logging and debugging; credentials in the connection string are redacted
 */
export function getConfigSummary(config: PipelineConfig): Record<string, unknown> {
  return {
    url: config.url,
    is_playlist: config.isPlaylist,
    database: redactSensitiveData(config.databaseUrl),
    audio_dir: config.audioDir,
    transcript_dir: config.transcriptDir,
    persist_transcripts: config.persistTranscripts,
    audio_format: config.audioFormat,
    continue_on_error: config.continueOnError,
    concurrency: config.concurrency,
    track_timeout_ms: config.trackTimeoutMs,
    advisory_lock: config.useAdvisoryLock,
    deepgram_model: config.deepgramModel,
    language: config.language ?? 'auto',
  };
}

#!/usr/bin/env node

/**
 * Track Transcription Job
 *
 * Discovers a track or a playlist, downloads the audio, transcribes it and
 * stores tracks and transcripts in PostgreSQL. Re-running on the same URL only
 * does the work that is still missing.
 *
 * Usage:
 *   npx tsx jobs/transcribeTracks.ts                              # TRACK_URL / IS_PLAYLIST from env
 *   npx tsx jobs/transcribeTracks.ts https://example.com/track    # single track
 *   npx tsx jobs/transcribeTracks.ts --playlist https://example.com/sets/mix
 *
 * Environment Variables:
 *   TRACK_URL               - Track or playlist page (required unless given as an argument)
 *   IS_PLAYLIST             - Treat TRACK_URL as a playlist (default: false)
 *   DATABASE_URL            - PostgreSQL connection string (required)
 *   TMP_DIR                 - Base directory for the audio and transcript caches (default: ./tmp)
 *   CONTINUE_ON_ERROR       - Keep going after a track fails (default: false)
 *   PIPELINE_CONCURRENCY    - Tracks processed in parallel, 1-16 (default: 1)
 *   DEEPGRAM_API_KEY        - Deepgram API key (required)
 *   See .env.example for the full list.
 *
 * Exit Codes:
 *   0 - Success (every usable track transcribed or already done)
 *   1 - Configuration error (missing env vars, bad arguments)
 *   2 - Database connection or schema error
 *   3 - Any other failure, including a run that finished with failed tracks
 */

import dotenv from 'dotenv';
import { getConfigSummary, getPipelineConfig } from '../config/pipelineConfig';
import { DeepgramTranscriptionProvider } from '../lib/clients/deepgramTranscriptionProvider';
import { YtDlpDiscoveryProvider } from '../lib/clients/ytDlpDiscoveryProvider';
import { ensureSchema } from '../lib/db/migrate';
import { closeSharedPool, getSharedPool } from '../lib/db/sharedPool';
import { PostgresTrackStore } from '../lib/db/trackStore';
import { ConfigError, PipelineAbortedError, StoreError, errorMessage } from '../lib/errors';
import { Logger, createLogger } from '../lib/logger';
import { PipelineOrchestrator, type PipelineRunSummary } from '../services/PipelineOrchestrator';

export const EXIT_SUCCESS = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_DATABASE_ERROR = 2;
export const EXIT_FAILURE = 3;

export interface CliArgs {
  url?: string;
  playlist: boolean;
}

/**
 * Accepts at most one positional URL and the `--playlist` flag
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { playlist: false };
  for (const arg of argv) {
    if (arg === '--playlist') {
      args.playlist = true;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else if (args.url === undefined) {
      args.url = arg;
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}. Only one URL may be given.`);
    }
  }
  return args;
}

/**
 * Command-line arguments take precedence over TRACK_URL and IS_PLAYLIST
 */
export function applyCliArgs(
  env: Record<string, string | undefined>,
  args: CliArgs
): Record<string, string | undefined> {
  return {
    ...env,
    TRACK_URL: args.url ?? env.TRACK_URL,
    IS_PLAYLIST: args.playlist ? 'true' : env.IS_PLAYLIST
  };
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof ConfigError) return EXIT_CONFIG_ERROR;
  if (error instanceof StoreError) return EXIT_DATABASE_ERROR;
  return EXIT_FAILURE;
}

export function exitCodeForSummary(summary: PipelineRunSummary): number {
  return summary.failed > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
}

/**
 * Run the job end to end and return the exit code. The pool is always closed.
 */
export async function runTranscribeTracks(
  argv: string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
  logger: Logger = createLogger()
): Promise<number> {
  try {
    const config = getPipelineConfig(applyCliArgs(env, parseCliArgs(argv)));
    logger.info('system', 'Track transcription job starting', { metadata: getConfigSummary(config) });

    // Engines are chosen here and nowhere else
    const discovery = new YtDlpDiscoveryProvider({
      binaryPath: config.ytDlpPath,
      audioFormat: config.audioFormat,
      logger
    });
    const transcription = new DeepgramTranscriptionProvider({
      apiKey: config.deepgramApiKey,
      model: config.deepgramModel,
      language: config.language,
      logger
    });

    const pool = getSharedPool(config.databaseUrl);
    await ensureSchema(pool, logger);

    const orchestrator = new PipelineOrchestrator(config, {
      store: new PostgresTrackStore(pool, logger),
      discovery,
      transcription,
      logger
    });

    const summary = await orchestrator.run();
    logSummary(logger, summary);
    return exitCodeForSummary(summary);
  } catch (error) {
    if (error instanceof PipelineAbortedError) {
      logger.error('pipeline', 'Pipeline aborted', { error: error.message, metadata: { partial: error.partial } });
    } else {
      logger.error('system', 'Track transcription job failed', { error: errorMessage(error) });
    }
    return exitCodeForError(error);
  } finally {
    await closeSharedPool();
  }
}

function logSummary(logger: Logger, summary: PipelineRunSummary): void {
  logger.info('pipeline', 'Track transcription job summary', {
    run_id: summary.runId,
    duration_ms: summary.elapsedMs,
    success: summary.failed === 0,
    metadata: {
      url: summary.url,
      playlist_title: summary.playlistTitle,
      discovered: summary.discovered,
      skipped_invalid: summary.skippedInvalid,
      skipped_finished: summary.skippedFinished,
      transcribed: summary.transcribed,
      failed: summary.failed,
      lock_not_acquired: summary.lockNotAcquired
    }
  });
}

/**
 * Catch unhandled promise rejections & uncaught exceptions
 * so a scheduler sees a non-zero exit code
 */
function setupUnhandledExceptionHandlers(): void {
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
    setTimeout(() => process.exit(EXIT_FAILURE), 100);
  });

  process.on('uncaughtException', (err) => {
    console.error('UNCAUGHT EXCEPTION:', err);
    setTimeout(() => process.exit(EXIT_FAILURE), 100);
  });
}

// Only run when executed directly (not imported by tests)
if (require.main === module) {
  dotenv.config();
  setupUnhandledExceptionHandlers();
  runTranscribeTracks()
    .then((exitCode) => process.exit(exitCode))
    .catch((error) => {
      console.error('Unhandled error in main:', error);
      process.exit(EXIT_FAILURE);
    });
}

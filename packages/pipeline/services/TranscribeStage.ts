import { promises as fs } from 'fs';
import { laterStatus, type AlignedResult, type Track, type Transcript } from '@trackscribe/shared';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { TranscriptionProvider } from '../lib/clients/types';
import { PreconditionError, TranscriptionError, errorMessage, isPipelineError } from '../lib/errors';
import { Logger, createLogger } from '../lib/logger';
import { plainTextCachePath, resolveTrackId, transcriptCachePath } from '../lib/trackIdentity';
import { isAlignedResult, normalizeAlignedResult, renderPlainText } from '../lib/utils/alignedResult';
import { fileExists, writeFileAtomic } from '../lib/utils/fs';

export type TranscribeStageConfig = Pick<PipelineConfig, 'transcriptDir'>;

export interface TranscribeStageResult {
  track: Track;
  transcript: Transcript;
}

/**
 * Turns a downloaded artifact into an aligned transcript.
 *
 * With `persistToDisk`, `<transcriptDir>/<id>.json` is the cache: a readable
 * file there short-circuits the engine, and its `<id>.txt` rendering is
 * created when missing.
 */
export class TranscribeStage {
  private readonly config: TranscribeStageConfig;
  private readonly provider: TranscriptionProvider;
  private readonly logger: Logger;

  constructor(config: TranscribeStageConfig, provider: TranscriptionProvider, logger?: Logger) {
    this.config = config;
    this.provider = provider;
    this.logger = logger || createLogger();
  }

  async transcribeTrack(track: Track, persistToDisk: boolean, signal?: AbortSignal): Promise<TranscribeStageResult> {
    const trackId = resolveTrackId(track.webpageUrl);
    const audioPath = track.audioFilePath;
    if (!audioPath) {
      throw new PreconditionError('Transcription requested before the track was downloaded', trackId);
    }
    if (!(await fileExists(audioPath))) {
      throw new PreconditionError(`Audio artifact missing at ${audioPath}`, trackId);
    }

    const jsonPath = transcriptCachePath(this.config.transcriptDir, trackId);
    const textPath = plainTextCachePath(this.config.transcriptDir, trackId);

    let alignedResult = persistToDisk ? await this.loadCached(jsonPath, trackId) : null;

    if (alignedResult) {
      if (!(await fileExists(textPath))) {
        await writeFileAtomic(textPath, renderPlainText(alignedResult));
        this.logger.debug('transcribe', 'Plain-text rendering regenerated from cache', { track_id: trackId });
      }
    } else {
      alignedResult = await this.runEngine(audioPath, trackId, signal);
      if (persistToDisk) {
        await writeFileAtomic(jsonPath, JSON.stringify(alignedResult, null, 2));
        await writeFileAtomic(textPath, renderPlainText(alignedResult));
      }
    }

    const transcript: Transcript = {
      id: trackId,
      trackId,
      alignedResult,
      embedding: null
    };

    return {
      track: {
        ...track,
        id: trackId,
        status: laterStatus(track.status, 'TRANSCRIBED'),
        transcript
      },
      transcript
    };
  }

  private async runEngine(audioPath: string, trackId: string, signal?: AbortSignal): Promise<AlignedResult> {
    try {
      signal?.throwIfAborted();
      const transcription = await this.provider.transcribe(audioPath, signal);
      // Nothing to align when the engine heard nothing
      const aligned = transcription.segments.length > 0
        ? await this.provider.align(transcription.segments, transcription.languageCode, audioPath, signal)
        : { segments: [] };

      return normalizeAlignedResult({
        languageCode: transcription.languageCode,
        segments: aligned.segments
      });
    } catch (error) {
      if (isPipelineError(error)) throw error;
      throw new TranscriptionError(`Transcription failed: ${errorMessage(error)}`, trackId, error);
    }
  }

  /**
   * A cache file that cannot be read or parsed is treated as absent
   */
  private async loadCached(jsonPath: string, trackId: string): Promise<AlignedResult | null> {
    if (!(await fileExists(jsonPath))) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(await fs.readFile(jsonPath, 'utf-8'));
      if (!isAlignedResult(parsed)) {
        this.logger.warn('transcribe', 'Cached transcript has an unexpected shape, transcribing again', {
          track_id: trackId,
          metadata: { path: jsonPath }
        });
        return null;
      }
      this.logger.debug('transcribe', 'Loaded transcript from cache', {
        track_id: trackId,
        metadata: { path: jsonPath }
      });
      return normalizeAlignedResult(parsed);
    } catch (error) {
      this.logger.warn('transcribe', 'Cached transcript unreadable, transcribing again', {
        track_id: trackId,
        error: errorMessage(error),
        metadata: { path: jsonPath }
      });
      return null;
    }
  }
}

import type { Track } from '@trackscribe/shared';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { DiscoveredEntry, DiscoveryProvider, TranscriptionProvider } from '../lib/clients/types';
import type { RunLock, TrackStore } from '../lib/db/trackStore';
import { PipelineAbortedError, TrackTimeoutError, toError } from '../lib/errors';
import { Logger, TrackLogger, createLogger, createTrackLogger, type TrackStage } from '../lib/logger';
import { resolveTrackId } from '../lib/trackIdentity';
import { KeyedMutex, processWithConcurrencySettled } from '../lib/utils/concurrencyController';
import { FetchStage } from './FetchStage';
import { TranscribeStage } from './TranscribeStage';

export type TrackOutcomeStatus = 'transcribed' | 'skipped_finished' | 'failed' | 'not_started';

/**
 * What happened to one usable entry in a run
 */
export interface TrackOutcome {
  trackId: string;
  webpageUrl: string;
  title: string;
  trackNumberInPlaylist: number | null;
  status: TrackOutcomeStatus;
  error?: string;
  durationMs: number;
}

/**
 * Summary of one orchestrator run
 */
export interface PipelineRunSummary {
  runId: string;
  url: string;
  isPlaylist: boolean;
  playlistTitle: string | null;
  /** Entries reported by discovery, usable or not */
  discovered: number;
  skippedInvalid: number;
  skippedFinished: number;
  transcribed: number;
  failed: number;
  /** Tracks never started because the batch aborted */
  notStarted: number;
  /** Another run held the run lock, so nothing was done */
  lockNotAcquired: boolean;
  elapsedMs: number;
  /** Usable entries in source order */
  tracks: TrackOutcome[];
}

export interface PipelineDependencies {
  store: TrackStore;
  discovery: DiscoveryProvider;
  transcription: TranscriptionProvider;
  logger?: Logger;
}

export type OrchestratorConfig = Pick<
  PipelineConfig,
  | 'url'
  | 'isPlaylist'
  | 'audioDir'
  | 'transcriptDir'
  | 'persistTranscripts'
  | 'audioFormat'
  | 'continueOnError'
  | 'concurrency'
  | 'trackTimeoutMs'
  | 'useAdvisoryLock'
>;

type DiscoveredRun = Pick<PipelineRunSummary, 'playlistTitle' | 'discovered' | 'skippedInvalid'> & {
  tracks: Track[];
};

/**
 * Sequences discovery, download, transcription and persistence for a single
 * track or a playlist.
 *
 * Per track: skip if already TRANSCRIBED, otherwise fetch, record DOWNLOADED,
 * transcribe, write the transcript row, then record TRANSCRIBED. The transcript
 * row always exists before its track reaches TRANSCRIBED.
 *
 * Error policy: with `continueOnError` off (the default) the first fatal track
 * error stops the batch and surfaces as a PipelineAbortedError carrying the
 * partial summary; tracks already finished stay finished. With it on, failures
 * are recorded and the remaining tracks still run.
 */
export class PipelineOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly store: TrackStore;
  private readonly discovery: DiscoveryProvider;
  private readonly fetchStage: FetchStage;
  private readonly transcribeStage: TranscribeStage;
  private readonly logger: Logger;
  private readonly trackMutex = new KeyedMutex();

  constructor(config: OrchestratorConfig, dependencies: PipelineDependencies) {
    this.config = config;
    this.store = dependencies.store;
    this.discovery = dependencies.discovery;
    this.logger = dependencies.logger || createLogger();
    this.fetchStage = new FetchStage(config, dependencies.discovery, this.logger);
    this.transcribeStage = new TranscribeStage(config, dependencies.transcription, this.logger);
  }

  /**
   * Main entry point: process `config.url` as a playlist or a single track
   */
  async run(): Promise<PipelineRunSummary> {
    const runId = `pipeline-${new Date().toISOString()}`;
    const startTime = Date.now();

    this.logger.info('pipeline', 'Starting pipeline run', {
      run_id: runId,
      metadata: {
        url: this.config.url,
        is_playlist: this.config.isPlaylist,
        concurrency: this.config.concurrency,
        continue_on_error: this.config.continueOnError
      }
    });

    let lock: RunLock | null = null;
    if (this.config.useAdvisoryLock) {
      lock = await this.store.tryAcquireRunLock();
      if (!lock) {
        this.logger.warn('pipeline', 'Failed to acquire run lock - another pipeline run may be in progress', {
          run_id: runId
        });
        return { ...emptySummary(runId, this.config), lockNotAcquired: true };
      }
    }

    try {
      const summary = this.config.isPlaylist
        ? await this.processPlaylist(this.config.url, runId, startTime)
        : await this.processSingle(this.config.url, runId, startTime);

      this.logger.info('pipeline', 'Pipeline run complete', {
        run_id: runId,
        duration_ms: summary.elapsedMs,
        success: summary.failed === 0,
        metadata: {
          discovered: summary.discovered,
          skipped_invalid: summary.skippedInvalid,
          skipped_finished: summary.skippedFinished,
          transcribed: summary.transcribed,
          failed: summary.failed
        }
      });
      return summary;
    } finally {
      if (lock) {
        await lock.release();
      }
    }
  }

  async processSingle(url: string, runId: string, startTime: number = Date.now()): Promise<PipelineRunSummary> {
    const trackLogger = createTrackLogger(runId, this.logger);
    const entry = await this.discovery.resolveTrack(url);

    const track = this.toTrack(entry, 0, null, trackLogger);
    return this.processTracks(
      { playlistTitle: null, discovered: 1, skippedInvalid: track ? 0 : 1, tracks: track ? [track] : [] },
      runId,
      startTime,
      trackLogger
    );
  }

  async processPlaylist(url: string, runId: string, startTime: number = Date.now()): Promise<PipelineRunSummary> {
    const trackLogger = createTrackLogger(runId, this.logger);
    const playlist = await this.discovery.resolvePlaylist(url);

    if (playlist.entries.length === 0) {
      this.logger.warn('discovery', 'No entries found in playlist', { run_id: runId, metadata: { url } });
    }

    const tracks: Track[] = [];
    playlist.entries.forEach((entry, index) => {
      const track = this.toTrack(entry, index, { title: playlist.title, url }, trackLogger);
      if (track) tracks.push(track);
    });

    return this.processTracks(
      {
        playlistTitle: playlist.title,
        discovered: playlist.entries.length,
        skippedInvalid: playlist.entries.length - tracks.length,
        tracks
      },
      runId,
      startTime,
      trackLogger
    );
  }

  /**
   * Build the in-memory PENDING track for an entry, or null (with a warning)
   * when it lacks a canonical page URL or a media locator
   */
  private toTrack(
    entry: DiscoveredEntry,
    index: number,
    playlist: { title: string | null; url: string } | null,
    trackLogger: TrackLogger
  ): Track | null {
    if (!entry.webpageUrl) {
      trackLogger.entrySkipped(index, 'missing webpage URL');
      return null;
    }
    if (!entry.mediaUrl) {
      trackLogger.entrySkipped(index, 'missing media URL');
      return null;
    }

    return {
      id: resolveTrackId(entry.webpageUrl),
      title: entry.title ?? `Unknown Title Track ${index + 1}`,
      webpageUrl: entry.webpageUrl,
      downloadUrl: entry.mediaUrl,
      uploader: entry.uploader,
      durationSeconds: entry.duration,
      playlistTitle: playlist ? playlist.title : null,
      playlistUrl: playlist ? playlist.url : null,
      trackNumberInPlaylist: playlist ? index + 1 : null,
      status: 'PENDING',
      audioFilePath: null
    };
  }

  private async processTracks(
    discovered: DiscoveredRun,
    runId: string,
    startTime: number,
    trackLogger: TrackLogger
  ): Promise<PipelineRunSummary> {
    const { tracks } = discovered;
    const durations: number[] = new Array<number>(tracks.length).fill(0);

    const settled = await processWithConcurrencySettled(
      tracks,
      async (track, index) => {
        const trackStart = Date.now();
        try {
          return await this.processTrack(track, trackLogger);
        } finally {
          durations[index] = Date.now() - trackStart;
        }
      },
      this.config.concurrency,
      { stopOnError: !this.config.continueOnError }
    );

    const outcomes = tracks.map((track, index): TrackOutcome => {
      const error = settled.errors[index];
      const result = settled.results[index];
      const base = {
        trackId: track.id,
        webpageUrl: track.webpageUrl,
        title: track.title,
        trackNumberInPlaylist: track.trackNumberInPlaylist,
        durationMs: durations[index]
      };
      if (error) return { ...base, status: 'failed', error: error.message };
      if (result) return { ...base, status: result };
      return { ...base, status: 'not_started' };
    });

    const summary: PipelineRunSummary = {
      runId,
      url: this.config.url,
      isPlaylist: this.config.isPlaylist,
      playlistTitle: discovered.playlistTitle,
      discovered: discovered.discovered,
      skippedInvalid: discovered.skippedInvalid,
      skippedFinished: countOutcomes(outcomes, 'skipped_finished'),
      transcribed: countOutcomes(outcomes, 'transcribed'),
      failed: countOutcomes(outcomes, 'failed'),
      notStarted: countOutcomes(outcomes, 'not_started'),
      lockNotAcquired: false,
      elapsedMs: Date.now() - startTime,
      tracks: outcomes
    };

    if (!this.config.continueOnError) {
      const firstError = settled.errors.find((error): error is Error => error !== null);
      if (firstError) {
        throw new PipelineAbortedError(
          `Pipeline aborted after a track failed: ${firstError.message}`,
          summary,
          firstError
        );
      }
    }

    return summary;
  }

  /**
   * Run one track through every stage. At most one run per track id is in
   * flight; a duplicate entry waits and then finds the track finished.
   */
  private async processTrack(track: Track, trackLogger: TrackLogger): Promise<'transcribed' | 'skipped_finished'> {
    return this.withTimeout(track.id, (signal) =>
      this.trackMutex.runExclusive(track.id, async () => {
        const finished = await this.runStage('lookup', track.id, trackLogger, signal, () =>
          this.store.isTranscribed(track.webpageUrl)
        );
        if (finished) {
          trackLogger.stageSkipped('fetch', track.id, 'already transcribed');
          return 'skipped_finished';
        }

        const downloaded = await this.runStage('fetch', track.id, trackLogger, signal, () =>
          this.fetchStage.fetchTrack(track, signal)
        );
        await this.runStage('persist', track.id, trackLogger, signal, () => this.store.upsertTrack(downloaded));

        const { track: transcribed, transcript } = await this.runStage('transcribe', track.id, trackLogger, signal, () =>
          this.transcribeStage.transcribeTrack(downloaded, this.config.persistTranscripts, signal)
        );

        await this.runStage('persist', track.id, trackLogger, signal, async () => {
          await this.store.upsertTranscript(transcript);
          await this.store.upsertTrack(transcribed);
        });
        return 'transcribed';
      })
    );
  }

  private async runStage<T>(
    stage: TrackStage,
    trackId: string,
    trackLogger: TrackLogger,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    // A track past its deadline starts no further stage
    signal?.throwIfAborted();
    const stageStart = Date.now();
    trackLogger.stageStart(stage, trackId);
    try {
      const result = await fn();
      trackLogger.stageComplete(stage, trackId, Date.now() - stageStart);
      return result;
    } catch (error) {
      trackLogger.stageFailed(stage, trackId, toError(error));
      throw error;
    }
  }

  /**
   * Race the track's work against `trackTimeoutMs`. On expiry the signal handed
   * to the providers and stages is aborted and the track fails with
   * TrackTimeoutError, unless the work completes anyway. Either way the call
   * waits for the work to settle, so the track keeps its concurrency slot and
   * nothing is written after it returns.
   */
  private async withTimeout<T>(trackId: string, work: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.config.trackTimeoutMs;
    if (timeoutMs <= 0) {
      return work();
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TrackTimeoutError(trackId, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    const running = work(controller.signal);
    try {
      return await Promise.race([running, timeout]);
    } catch (error) {
      if (!controller.signal.aborted) throw error;
      return await running.catch(() => {
        throw error;
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

function countOutcomes(outcomes: TrackOutcome[], status: TrackOutcomeStatus): number {
  return outcomes.filter((outcome) => outcome.status === status).length;
}

function emptySummary(runId: string, config: OrchestratorConfig): PipelineRunSummary {
  return {
    runId,
    url: config.url,
    isPlaylist: config.isPlaylist,
    playlistTitle: null,
    discovered: 0,
    skippedInvalid: 0,
    skippedFinished: 0,
    transcribed: 0,
    failed: 0,
    notStarted: 0,
    lockNotAcquired: false,
    elapsedMs: 0,
    tracks: []
  };
}

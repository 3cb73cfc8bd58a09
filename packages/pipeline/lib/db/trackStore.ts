/**
 * Persistence gateway for tracks and transcripts
 *
 * Every write is a single INSERT ... ON CONFLICT statement, so a failure leaves
 * either the old row or the new one. Errors are wrapped in StoreError and
 * propagate to the caller; nothing here retries.
 */

import type { Pool, PoolClient } from 'pg';
import {
  TABLES,
  type BaseEntity,
  type StoredTrack,
  type StoredTranscript,
  type Track,
  type TrackRow,
  type Transcript,
  type TranscriptRow
} from '@trackscribe/shared';
import { PreconditionError, StoreError } from '../errors';
import { Logger, createLogger } from '../logger';
import { resolveTrackId } from '../trackIdentity';

/**
 * Handle for a held run lock
 */
export interface RunLock {
  release(): Promise<void>;
}

export interface TrackStore {
  /** True iff a row for the URL's resolved id exists at TRANSCRIBED or a later stage */
  isTranscribed(canonicalUrl: string): Promise<boolean>;
  /** Insert or update by id; status never moves backwards */
  upsertTrack(track: Track): Promise<StoredTrack>;
  /** Insert or update by owning track id */
  upsertTranscript(transcript: Transcript): Promise<StoredTranscript>;
  getTrack(trackId: string): Promise<StoredTrack | null>;
  getTranscript(trackId: string): Promise<StoredTranscript | null>;
  /** Delete a track and its transcript; false when no such track */
  deleteTrack(trackId: string): Promise<boolean>;
  /** Try to take the run-level lock; null when another run holds it */
  tryAcquireRunLock(): Promise<RunLock | null>;
}

// pg hands timestamptz back as Date
type PgRow<T extends BaseEntity> = {
  [K in keyof T]: K extends 'created_at' | 'updated_at' ? Date : T[K];
};

const TRACK_COLUMNS = `id, title, webpage_url, uploader, duration_seconds, playlist_title, playlist_url,
  track_number_in_playlist, status, audio_file_path, created_at, updated_at`;

const TRANSCRIPT_COLUMNS = 'id, track_id, aligned_result, embedding, created_at, updated_at';

const UPSERT_TRACK_SQL = `
  INSERT INTO ${TABLES.TRACKS} (
    id, title, webpage_url, uploader, duration_seconds, playlist_title, playlist_url,
    track_number_in_playlist, status, audio_file_path
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::track_processing_status, $10)
  ON CONFLICT (id) DO UPDATE SET
    title = EXCLUDED.title,
    webpage_url = EXCLUDED.webpage_url,
    uploader = EXCLUDED.uploader,
    duration_seconds = EXCLUDED.duration_seconds,
    playlist_title = EXCLUDED.playlist_title,
    playlist_url = EXCLUDED.playlist_url,
    track_number_in_playlist = EXCLUDED.track_number_in_playlist,
    status = GREATEST(${TABLES.TRACKS}.status, EXCLUDED.status),
    audio_file_path = COALESCE(EXCLUDED.audio_file_path, ${TABLES.TRACKS}.audio_file_path),
    updated_at = now()
  RETURNING ${TRACK_COLUMNS}`;

const UPSERT_TRANSCRIPT_SQL = `
  INSERT INTO ${TABLES.TRANSCRIPTS} (id, track_id, aligned_result, embedding)
  VALUES ($1, $2, $3::jsonb, $4)
  ON CONFLICT (track_id) DO UPDATE SET
    aligned_result = EXCLUDED.aligned_result,
    embedding = EXCLUDED.embedding,
    updated_at = now()
  RETURNING ${TRANSCRIPT_COLUMNS}`;

const IS_TRANSCRIBED_SQL = `
  SELECT EXISTS (
    SELECT 1 FROM ${TABLES.TRACKS}
    WHERE id = $1 AND status >= 'TRANSCRIBED'::track_processing_status
  ) AS transcribed`;

const RUN_LOCK_KEY = 'trackscribe_pipeline';

export class PostgresTrackStore implements TrackStore {
  private readonly pool: Pool;
  private readonly logger: Logger;

  constructor(pool: Pool, logger?: Logger) {
    this.pool = pool;
    this.logger = logger || createLogger();
  }

  async isTranscribed(canonicalUrl: string): Promise<boolean> {
    const trackId = resolveTrackId(canonicalUrl);
    const result = await this.execute('isTranscribed', () =>
      this.pool.query<{ transcribed: boolean }>(IS_TRANSCRIBED_SQL, [trackId])
    );
    return result.rows[0]?.transcribed === true;
  }

  async upsertTrack(track: Track): Promise<StoredTrack> {
    // downloadUrl is deliberately absent: media locators expire and are re-resolved each run
    const values = [
      track.id,
      track.title,
      track.webpageUrl,
      track.uploader,
      track.durationSeconds,
      track.playlistTitle,
      track.playlistUrl,
      track.trackNumberInPlaylist,
      track.status,
      track.audioFilePath
    ];
    const result = await this.execute('upsertTrack', () =>
      this.pool.query<PgRow<TrackRow>>(UPSERT_TRACK_SQL, values)
    );
    const row = result.rows[0];
    if (!row) {
      throw new StoreError('upsertTrack', new Error(`No row returned for track ${track.id}`));
    }

    this.logger.debug('database', 'Track upserted', {
      track_id: track.id,
      metadata: { status: row.status }
    });
    return mapTrackRow(row);
  }

  async upsertTranscript(transcript: Transcript): Promise<StoredTranscript> {
    if (transcript.id !== transcript.trackId) {
      throw new PreconditionError(
        `Transcript id ${transcript.id} does not match its track id ${transcript.trackId}`,
        transcript.trackId
      );
    }

    const values = [
      transcript.id,
      transcript.trackId,
      JSON.stringify(transcript.alignedResult),
      transcript.embedding
    ];
    const result = await this.execute('upsertTranscript', () =>
      this.pool.query<PgRow<TranscriptRow>>(UPSERT_TRANSCRIPT_SQL, values)
    );
    const row = result.rows[0];
    if (!row) {
      throw new StoreError('upsertTranscript', new Error(`No row returned for transcript ${transcript.id}`));
    }

    this.logger.debug('database', 'Transcript upserted', {
      track_id: transcript.trackId,
      metadata: { segments: transcript.alignedResult.segments.length }
    });
    return mapTranscriptRow(row);
  }

  async getTrack(trackId: string): Promise<StoredTrack | null> {
    const result = await this.execute('getTrack', () =>
      this.pool.query<PgRow<TrackRow>>(`SELECT ${TRACK_COLUMNS} FROM ${TABLES.TRACKS} WHERE id = $1`, [trackId])
    );
    const row = result.rows[0];
    return row ? mapTrackRow(row) : null;
  }

  async getTranscript(trackId: string): Promise<StoredTranscript | null> {
    const result = await this.execute('getTranscript', () =>
      this.pool.query<PgRow<TranscriptRow>>(
        `SELECT ${TRANSCRIPT_COLUMNS} FROM ${TABLES.TRANSCRIPTS} WHERE track_id = $1`,
        [trackId]
      )
    );
    const row = result.rows[0];
    return row ? mapTranscriptRow(row) : null;
  }

  /**
   * Delete the transcript, then the track, in one transaction. The FK cascade
   * would remove the transcript on its own; the explicit delete keeps the
   * behaviour independent of how the schema was created.
   */
  async deleteTrack(trackId: string): Promise<boolean> {
    const client = await this.execute('deleteTrack', () => this.pool.connect());
    try {
      await client.query('BEGIN');
      await client.query(`DELETE FROM ${TABLES.TRANSCRIPTS} WHERE track_id = $1`, [trackId]);
      const deleted = await client.query(`DELETE FROM ${TABLES.TRACKS} WHERE id = $1`, [trackId]);
      await client.query('COMMIT');
      return (deleted.rowCount ?? 0) > 0;
    } catch (error) {
      await rollbackQuietly(client, this.logger);
      throw new StoreError('deleteTrack', error);
    } finally {
      client.release();
    }
  }

  /**
   * Session-level advisory lock, so it lives on a dedicated client until released
   */
  async tryAcquireRunLock(): Promise<RunLock | null> {
    const client = await this.execute('tryAcquireRunLock', () => this.pool.connect());
    let acquired = false;
    try {
      const result = await client.query<{ acquired: boolean }>(
        'SELECT pg_try_advisory_lock(hashtext($1)) AS acquired',
        [RUN_LOCK_KEY]
      );
      acquired = result.rows[0]?.acquired === true;
    } catch (error) {
      client.release();
      throw new StoreError('tryAcquireRunLock', error);
    }

    if (!acquired) {
      client.release();
      this.logger.debug('database', 'Advisory lock not acquired', { metadata: { lock_key: RUN_LOCK_KEY } });
      return null;
    }

    this.logger.debug('database', 'Advisory lock acquired', { metadata: { lock_key: RUN_LOCK_KEY } });
    const logger = this.logger;
    return {
      async release(): Promise<void> {
        try {
          await client.query('SELECT pg_advisory_unlock(hashtext($1))', [RUN_LOCK_KEY]);
          logger.debug('database', 'Advisory lock released', { metadata: { lock_key: RUN_LOCK_KEY } });
        } finally {
          client.release();
        }
      }
    };
  }

  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      this.logger.error('database', `Store operation failed: ${operation}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      throw new StoreError(operation, error);
    }
  }
}

async function rollbackQuietly(client: PoolClient, logger: Logger): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    // The caller rethrows the error that triggered the rollback
    logger.warn('database', 'Rollback failed', {
      error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
    });
  }
}

function mapTrackRow(row: PgRow<TrackRow>): StoredTrack {
  return {
    id: row.id,
    title: row.title,
    webpageUrl: row.webpage_url,
    uploader: row.uploader,
    durationSeconds: row.duration_seconds,
    playlistTitle: row.playlist_title,
    playlistUrl: row.playlist_url,
    trackNumberInPlaylist: row.track_number_in_playlist,
    status: row.status,
    audioFilePath: row.audio_file_path,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function mapTranscriptRow(row: PgRow<TranscriptRow>): StoredTranscript {
  return {
    id: row.id,
    trackId: row.track_id,
    alignedResult: row.aligned_result,
    embedding: row.embedding,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

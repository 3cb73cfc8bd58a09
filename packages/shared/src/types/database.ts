/**
 * Row shapes for the tracks and transcripts tables
 * Mirrors packages/pipeline/lib/db/schema.sql
 */

import type { BaseEntity } from './common';
import type { TrackStatus } from './track';
import type { AlignedResult } from './transcript';

export interface TrackRow extends BaseEntity {
  title: string;
  webpage_url: string;
  uploader: string | null;
  duration_seconds: number | null;
  playlist_title: string | null;
  playlist_url: string | null;
  track_number_in_playlist: number | null;
  status: TrackStatus;
  audio_file_path: string | null;
}

export interface TranscriptRow extends BaseEntity {
  track_id: string;
  aligned_result: AlignedResult;
  embedding: number[] | null;
}

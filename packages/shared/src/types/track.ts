/**
 * Track types for remote audio items moving through the pipeline
 */

import type { Transcript } from './transcript';

/**
 * Ordered processing statuses. A track only ever moves forward through this list.
 * - PENDING: discovered, nothing on disk yet
 * - DOWNLOADED: audio artifact exists locally
 * - TRANSCRIBED: aligned transcript stored
 * - EMBEDDED: reserved for the embedding stage
 */
export const TRACK_STATUS_ORDER = ['PENDING', 'DOWNLOADED', 'TRANSCRIBED', 'EMBEDDED'] as const;

export type TrackStatus = (typeof TRACK_STATUS_ORDER)[number];

/**
 * True when `current` is `target` or any later stage
 */
export function hasReachedStatus(current: TrackStatus, target: TrackStatus): boolean {
  return TRACK_STATUS_ORDER.indexOf(current) >= TRACK_STATUS_ORDER.indexOf(target);
}

/**
 * The later of two statuses; used so that writes never move a track backwards
 */
export function laterStatus(a: TrackStatus, b: TrackStatus): TrackStatus {
  return hasReachedStatus(a, b) ? a : b;
}

// In-memory track as it moves through the stages
export interface Track {
  id: string;                     // UUIDv5 of webpageUrl
  title: string;
  webpageUrl: string;             // canonical page locator, the dedup key
  downloadUrl: string | null;     // ephemeral media locator, never persisted
  uploader: string | null;
  durationSeconds: number | null;
  // Playlist context, null for tracks processed on their own
  playlistTitle: string | null;
  playlistUrl: string | null;
  trackNumberInPlaylist: number | null; // 1-based position in source order
  status: TrackStatus;
  audioFilePath: string | null;
  transcript?: Transcript;
}

// Track as read back from the store (no ephemeral fields)
export type StoredTrack = Omit<Track, 'downloadUrl' | 'transcript'> & {
  createdAt: string;
  updatedAt: string;
};

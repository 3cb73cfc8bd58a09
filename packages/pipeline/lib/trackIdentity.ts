/**
 * Deterministic track identity and the paths derived from it
 *
 * A track's id is the UUIDv5 of its canonical page URL in the standard URL
 * namespace. The same URL yields the same id in every run and process, so the
 * id doubles as the file name of every artifact and the primary key of every row.
 */

import path from 'path';
import { v5 as uuidv5 } from 'uuid';
import { MetadataError } from './errors';

// RFC 4122 namespace for URLs
export const TRACK_ID_NAMESPACE = uuidv5.URL;

/**
 * Resolve the stable id for a canonical page URL.
 * The URL is hashed byte-for-byte: no trimming, case folding or normalization.
 */
export function resolveTrackId(canonicalUrl: string): string {
  if (!canonicalUrl) {
    throw new MetadataError('Cannot resolve a track id without a canonical URL');
  }
  return uuidv5(canonicalUrl, TRACK_ID_NAMESPACE);
}

export function audioArtifactPath(audioDir: string, trackId: string, format: string): string {
  return path.join(audioDir, `${trackId}.${format}`);
}

export function transcriptCachePath(transcriptDir: string, trackId: string): string {
  return path.join(transcriptDir, `${trackId}.json`);
}

export function plainTextCachePath(transcriptDir: string, trackId: string): string {
  return path.join(transcriptDir, `${trackId}.txt`);
}

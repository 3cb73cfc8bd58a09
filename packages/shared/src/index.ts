// Shared domain types for the trackscribe packages

// Table names used by the persistence layer
export const TABLES = Object.freeze({
  TRACKS: 'tracks',
  TRANSCRIPTS: 'transcripts',
} as const);

// Export all types
export * from './types/index';

/**
 * Common utility types used across the application
 */

// Generic database entity with timestamps
export interface BaseEntity {
  id: string;
  created_at: string;
  updated_at: string;
}


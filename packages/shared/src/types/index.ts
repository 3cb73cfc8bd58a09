export * from './common';
export * from './track';
export * from './transcript';
export * from './database';

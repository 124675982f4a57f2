export * from './research.js';
export * from './transcript.js';
export * from './events.js';
export * from './errors.js';

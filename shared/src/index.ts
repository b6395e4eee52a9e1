export * from './domain/conflict.js';
export * from './domain/notes.js';
export * from './domain/retryQueue.js';
export * from './domain/syncState.js';
export * from './sync/dto.js';

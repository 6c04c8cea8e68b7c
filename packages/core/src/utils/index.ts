export * from './environment.js';
export * from './metadata.js';

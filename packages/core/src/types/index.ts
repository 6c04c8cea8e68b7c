export * from './result.js';
export * from './metadata.js';
export * from './config-payload.js';
export * from './request.js';

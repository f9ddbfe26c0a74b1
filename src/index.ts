// File serving
export * from './file-serving/index.ts';
// Middleware
export * from './middleware/logging.ts';
// Transports
export * from './transports/http.ts';
export * from './transports/node-http.ts';
export { type ParsedServerConfig, parseConfig } from './transports/parse-config.ts';
// Core types
export * from './types.ts';

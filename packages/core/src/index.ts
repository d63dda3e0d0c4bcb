export { generateRequestId } from './utils/request/index.js';

// Logging with redaction
export * from './logging/index.js';

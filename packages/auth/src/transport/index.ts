export * from './http-transport.js';
export * from './fetch-http-transport.js';

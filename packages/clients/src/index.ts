export * from './telegram-client.js';
export * from './number-api-client.js';

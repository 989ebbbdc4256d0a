export * from './history.js';
export * from './catalog.js';
export * from './config.js';

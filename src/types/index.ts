export * from './lcax.js';
export * from './raw.js';

export * from './registry-entry.js';

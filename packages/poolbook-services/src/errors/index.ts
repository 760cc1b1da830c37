export * from './registry-errors.js';

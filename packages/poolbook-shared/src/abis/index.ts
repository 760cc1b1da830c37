export * from './swap/index.js';

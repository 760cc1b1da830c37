export * from './pool-record.js';
export * from './pool-record.utils.js';

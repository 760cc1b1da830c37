export { WriteSerializer } from './write-serializer.js';

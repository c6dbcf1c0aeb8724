export { executionContextPlugin } from './execution-context.js';

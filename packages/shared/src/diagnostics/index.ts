export { buildBatchSummary, FAILURE_KINDS } from './summary-builder.js';

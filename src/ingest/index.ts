export {
  loadAbTestLog,
  parseAbTestLog,
  type IngestOptions,
  type IngestResult,
  type RejectedRecord,
} from './emf-log.js';

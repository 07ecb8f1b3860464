export { ExtractionError, wrapError, errorMessage } from './extraction-error.js';
export type { ExtractionErrorCode, ExtractionErrorDetails } from './extraction-error.js';

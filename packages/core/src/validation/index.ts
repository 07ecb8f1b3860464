export {
  connectionInputSchema,
  analysisOptionsSchema,
  extractionRequestSchema,
  formatZodIssues,
  parseConnectionConfig,
  parseAnalysisOptions,
  parseExtractionRequest,
} from './schemas.js';

export {
  DataQualityAnalyzer,
  DEFAULT_QUALITY_CONCURRENCY,
  DEFAULT_TABLE_TIMEOUT_MS,
  selectTablesForQuality,
} from './quality-analyzer.js';
export type { QualityAnalyzerOptions, SelectedTable } from './quality-analyzer.js';
export {
  ATTENTION_MAX_NULL_PERCENT,
  ATTENTION_MIN_UNIQUENESS,
  EXCELLENT_MAX_NULL_PERCENT,
  EXCELLENT_MIN_UNIQUENESS,
  rateTableQuality,
} from './quality-rating.js';

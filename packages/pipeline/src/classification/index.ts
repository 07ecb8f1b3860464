export { SensitiveColumnClassifier } from './sensitive-classifier.js';
export type { ColumnClassification } from './sensitive-classifier.js';
export {
  DEFAULT_PATTERN_TABLE_URL,
  defaultPatternTable,
  loadPatternTable,
  parsePatternTable,
  patternTableSchema,
} from './pattern-table.js';
export type { PatternTable, PatternTableInput } from './pattern-table.js';

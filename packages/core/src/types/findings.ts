/**
 * Sensitive column findings
 */

export type KnownSensitiveCategory = 'Authentication' | 'Financial' | 'Health' | 'PII';

/** Categories come from the pattern table, so custom names are allowed */
export type SensitiveCategory = KnownSensitiveCategory | (string & {});

export type Confidence = 'High' | 'Medium' | 'Low';

export interface SensitiveFinding {
  schema: string;
  table: string;
  column: string;
  dataType: string;
  category: SensitiveCategory;
  patternMatched: string;
  confidence: Confidence;
}

export interface SensitiveDataReport {
  findings: SensitiveFinding[];
  /** Finding count per declared category, zero included */
  summary: Record<string, number>;
}

/**
 * Data quality metrics
 */

export type QualityRating = 'Excellent' | 'Good' | 'NeedsAttention';

export interface ColumnQuality {
  column: string;
  dataType: string;
  nullCount: number;
  /** 0..100, 0 for an empty table */
  nullPercentage: number;
  distinctCount: number;
  /** 0..1, 0 for an empty table */
  uniquenessRatio: number;
}

export interface AnalyzedTableQuality {
  status: 'analyzed';
  schema: string;
  table: string;
  rowCount: number;
  columns: ColumnQuality[];
  qualityRating: QualityRating;
  analyzedAt: string;
}

export interface FailedTableQuality {
  status: 'error';
  schema: string;
  table: string;
  error: {
    code: 'PARTIAL_TABLE_FAILURE' | 'QUERY_TIMEOUT';
    message: string;
  };
  analyzedAt: string;
}

export type QualityMetric = AnalyzedTableQuality | FailedTableQuality;

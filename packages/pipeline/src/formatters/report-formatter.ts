/**
 * Extraction Report Formatter
 *
 * Formats an extraction result as plain text for CLI output and MCP tool
 * responses.
 */

import { DIALECT_LABELS, type ExtractionResult, type QualityMetric } from '@schemalens/core';

/** Findings listed individually before the report truncates */
export const MAX_LISTED_FINDINGS = 25;

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function averageNullPercentage(metric: QualityMetric): string {
  if (metric.status !== 'analyzed' || metric.columns.length === 0) return '-';
  const total = metric.columns.reduce((sum, column) => sum + column.nullPercentage, 0);
  return formatPercent(total / metric.columns.length);
}

/**
 * Format an extraction result as plain text
 */
export function formatExtractionReport(result: ExtractionResult): string {
  const lines: string[] = [];

  // Header
  lines.push(`## Extraction Report`);
  lines.push(`Run: ${result.runId}`);
  lines.push(`Database: ${result.database} (${DIALECT_LABELS[result.dialect]})`);
  lines.push(`Status: ${result.status}`);
  lines.push(`Steps: ${result.stepsCompleted.length > 0 ? result.stepsCompleted.join(' -> ') : 'none'}`);
  lines.push('');

  if (result.error) {
    lines.push(`### Error`);
    lines.push(`[${result.error.code}] ${result.error.message}`);
    if (result.error.stage) lines.push(`Stage: ${result.error.stage}`);
    lines.push('');
  }

  const probe = result.connectionTest;
  if (probe) {
    lines.push(`### Connection Test`);
    if (probe.status === 'success') {
      lines.push(`${probe.message} (${probe.latencyMs}ms)`);
    } else {
      lines.push(`Failed [${probe.code}]: ${probe.message}`);
    }
    lines.push('');
  }

  const schema = result.schemaMetadata;
  if (schema) {
    const { statistics } = schema;
    lines.push(`### Schema`);
    lines.push(`- Schemas: ${statistics.schemaCount}`);
    lines.push(`- Tables: ${statistics.tableCount}`);
    lines.push(`- Columns: ${statistics.columnCount}`);
    for (const entry of schema.schemas) {
      lines.push(`- ${entry.name}: ${entry.tables.length} table(s)`);
    }
    lines.push('');
  }

  const findings = result.sensitiveFindings;
  if (findings) {
    lines.push(`### Sensitive Columns (${findings.length})`);
    if (findings.length === 0) {
      lines.push(`No sensitive columns detected.`);
    }
    for (const finding of findings.slice(0, MAX_LISTED_FINDINGS)) {
      lines.push(
        `- ${finding.schema}.${finding.table}.${finding.column}: ${finding.category} ` +
          `(${finding.confidence}, matched "${finding.patternMatched}")`
      );
    }
    if (findings.length > MAX_LISTED_FINDINGS) {
      lines.push(`... and ${findings.length - MAX_LISTED_FINDINGS} more`);
    }
    lines.push('');
  }

  const quality = result.qualityMetrics;
  if (quality) {
    lines.push(`### Data Quality (${quality.length} table(s))`);
    if (quality.length > 0) {
      lines.push(`| Table | Rows | Avg null % | Rating |`);
      lines.push(`|---|---|---|---|`);
    }
    for (const metric of quality) {
      const name = `${metric.schema}.${metric.table}`;
      if (metric.status === 'analyzed') {
        lines.push(`| ${name} | ${metric.rowCount} | ${averageNullPercentage(metric)} | ${metric.qualityRating} |`);
      } else {
        lines.push(`| ${name} | - | - | ${metric.error.code} |`);
      }
    }
    lines.push('');
  }

  const summary = result.executionSummary;
  if (summary) {
    lines.push(`---`);
    lines.push(`Processing time: ${summary.durationMs}ms`);
  }

  return lines.join('\n');
}

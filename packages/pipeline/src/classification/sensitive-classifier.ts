/**
 * SensitiveColumnClassifier
 *
 * Flags columns whose names suggest sensitive content. Pure: works on
 * SchemaMetadata only and never fails.
 *
 * A column gets at most one finding. Categories are tried in priority
 * order and the first category with a match wins. Within a category an
 * exact keyword match (High) beats a substring match (Medium). Columns
 * with no keyword match may still get a Low finding from a type hint,
 * e.g. a date column named `birth_date`.
 */

import type {
  ColumnMetadata,
  Confidence,
  SchemaMetadata,
  SensitiveCategory,
  SensitiveDataReport,
  SensitiveFinding,
} from '@schemalens/core';
import { defaultPatternTable, type PatternTable } from './pattern-table.js';

export interface ColumnClassification {
  category: SensitiveCategory;
  patternMatched: string;
  confidence: Confidence;
}

interface CompiledCategory {
  category: string;
  keywords: readonly string[];
}

interface CompiledTypeHint {
  category: string;
  keywords: readonly string[];
  dataTypes: readonly string[];
}

export class SensitiveColumnClassifier {
  private readonly ordered: CompiledCategory[];
  private readonly typeHints: CompiledTypeHint[];

  constructor(table: PatternTable = defaultPatternTable()) {
    // Stable sort keeps file order for equal priorities
    this.ordered = [...table.categories]
      .sort((a, b) => a.priority - b.priority)
      .map(({ category, keywords }) => ({ category, keywords }));

    const rank = new Map(this.ordered.map((c, index) => [c.category, index]));
    this.typeHints = [...table.typeHints].sort(
      (a, b) => (rank.get(a.category) ?? Infinity) - (rank.get(b.category) ?? Infinity)
    );
  }

  /** Declared categories in priority order, type-hint-only categories last */
  get categories(): string[] {
    const names = this.ordered.map((c) => c.category);
    for (const hint of this.typeHints) {
      if (!names.includes(hint.category)) names.push(hint.category);
    }
    return names;
  }

  classifyColumn(column: Pick<ColumnMetadata, 'name' | 'dataType'>): ColumnClassification | null {
    const name = column.name.toLowerCase();

    for (const { category, keywords } of this.ordered) {
      const exact = keywords.find((keyword) => keyword === name);
      if (exact) {
        return { category, patternMatched: exact, confidence: 'High' };
      }
      const partial = keywords.find((keyword) => name.includes(keyword));
      if (partial) {
        return { category, patternMatched: partial, confidence: 'Medium' };
      }
    }

    const dataType = column.dataType.toLowerCase();
    for (const hint of this.typeHints) {
      if (!hint.dataTypes.some((type) => dataType.includes(type))) continue;
      const keyword = hint.keywords.find((k) => name.includes(k));
      if (keyword) {
        return { category: hint.category, patternMatched: keyword, confidence: 'Low' };
      }
    }

    return null;
  }

  classify(metadata: SchemaMetadata): SensitiveDataReport {
    const findings: SensitiveFinding[] = [];
    const summary: Record<string, number> = {};
    for (const category of this.categories) {
      summary[category] = 0;
    }

    for (const schema of metadata.schemas) {
      for (const table of schema.tables) {
        for (const column of table.columns) {
          const match = this.classifyColumn(column);
          if (!match) continue;

          findings.push({
            schema: schema.name,
            table: table.name,
            column: column.name,
            dataType: column.dataType,
            ...match,
          });
          summary[match.category] = (summary[match.category] ?? 0) + 1;
        }
      }
    }

    return { findings, summary };
  }
}

/**
 * Optimization History Export / Import
 *
 * Two formats:
 * - 'table':    CSV, one row per optimization, metrics as a JSON column
 * - 'document': JSON document tagged with format and version
 *
 * Imports are validated row by row; a history that belongs to another rule is rejected.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { HistoryImportError } from '../errors.js';
import { optimizationResultSchema } from './schemas.js';
import { OptimizationStrategy, type OptimizationResult } from './types.js';

export type HistoryExportFormat = 'table' | 'document';

export const HISTORY_TABLE_COLUMNS = [
  'rule_id',
  'parameter',
  'original_value',
  'optimized_value',
  'improvement',
  'strategy',
  'date',
  'metrics',
] as const;

export const HISTORY_DOCUMENT_FORMAT = 'optimization-history';
export const HISTORY_DOCUMENT_VERSION = 1;

const metricsColumnSchema = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'metrics is not valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.number()));

const historyRowSchema = z.object({
  rule_id: z.string().min(1),
  parameter: z.string().min(1),
  original_value: z.coerce.number().finite(),
  optimized_value: z.coerce.number().finite(),
  improvement: z.coerce.number().finite(),
  strategy: z.nativeEnum(OptimizationStrategy),
  date: z.coerce.date(),
  metrics: metricsColumnSchema,
});

const historyDocumentSchema = z.object({
  format: z.literal(HISTORY_DOCUMENT_FORMAT),
  version: z.literal(HISTORY_DOCUMENT_VERSION),
  ruleId: z.string().min(1),
  optimizations: z.array(optimizationResultSchema),
});

export function exportHistory(
  ruleId: string,
  optimizations: OptimizationResult[],
  format: HistoryExportFormat
): string {
  if (format === 'document') {
    return JSON.stringify(
      {
        format: HISTORY_DOCUMENT_FORMAT,
        version: HISTORY_DOCUMENT_VERSION,
        ruleId,
        optimizations,
      },
      null,
      2
    );
  }

  // Cells are stringified here: csv-stringify would write dates as epoch millis
  const rows = optimizations.map((result) => [
    result.ruleId,
    result.parameterName,
    String(result.originalValue),
    String(result.optimizedValue),
    String(result.improvement),
    result.strategy,
    result.createdAt.toISOString(),
    JSON.stringify(result.metrics),
  ]);

  return stringify(rows, { header: true, columns: [...HISTORY_TABLE_COLUMNS] });
}

/**
 * Parse an exported history for `ruleId`
 *
 * @throws HistoryImportError when the content is malformed or belongs to another rule
 */
export function importHistory(
  ruleId: string,
  content: string,
  format: HistoryExportFormat
): OptimizationResult[] {
  const optimizations = format === 'document' ? parseDocument(ruleId, content) : parseTable(content);

  const foreign = optimizations.find((result) => result.ruleId !== ruleId);
  if (foreign) {
    throw new HistoryImportError(`entry for rule '${foreign.ruleId}' in history of '${ruleId}'`);
  }

  return optimizations;
}

function parseDocument(ruleId: string, content: string): OptimizationResult[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new HistoryImportError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const parsed = historyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HistoryImportError(formatIssues(parsed.error));
  }
  if (parsed.data.ruleId !== ruleId) {
    throw new HistoryImportError(`document is tagged with rule '${parsed.data.ruleId}', expected '${ruleId}'`);
  }
  return parsed.data.optimizations;
}

function parseTable(content: string): OptimizationResult[] {
  let rows: unknown[];
  try {
    rows = parse(content.replace(/^\uFEFF/, ''), {
      columns: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new HistoryImportError(`invalid CSV (${error instanceof Error ? error.message : String(error)})`);
  }

  return rows.map((row, index) => {
    const parsed = historyRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new HistoryImportError(`row ${index + 1}: ${formatIssues(parsed.error)}`);
    }
    const data = parsed.data;
    return {
      ruleId: data.rule_id,
      parameterName: data.parameter,
      originalValue: data.original_value,
      optimizedValue: data.optimized_value,
      improvement: data.improvement,
      strategy: data.strategy,
      metrics: data.metrics,
      createdAt: data.date,
    };
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

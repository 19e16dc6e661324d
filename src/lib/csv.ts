import { examsOf } from './source';
import type { ParsedSource } from './combiner';
import type { StatCounts } from '../types/results';

export interface QuestionCsvRow {
  source: string;
  exam_index_in_source: number;
  test_number: string;
  element: number | '';
  number: number;
  question_id: string;
  selected: string;
  correct: string;
  is_correct: boolean;
}

/**
 * One row per graded question, across every exam of every source.
 * `exam_index_in_source` is 1-based.
 */
export function flattenQuestionRows(parsed: ParsedSource[]): QuestionCsvRow[] {
  const rows: QuestionCsvRow[] = [];

  for (const { source, result } of parsed) {
    examsOf(result).forEach((exam, i) => {
      for (const q of exam.questions) {
        rows.push({
          source,
          exam_index_in_source: i + 1,
          test_number: exam.metadata.test_number ?? '',
          element: exam.metadata.element ?? '',
          number: q.number,
          question_id: q.question_id,
          selected: q.selected,
          correct: q.correct,
          is_correct: q.is_correct,
        });
      }
    });
  }

  return rows;
}

/** Stat rows with accuracy rounded to four places for display */
export function roundStats<T extends StatCounts>(entries: T[]): T[] {
  return entries.map((entry) => ({
    ...entry,
    accuracy: Math.round(entry.accuracy * 10000) / 10000,
  }));
}

function escapeCell(value: unknown): string {
  const text = String(value ?? '');
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize rows to CSV using the first row's keys as the header.
 * Returns an empty string when there are no rows.
 */
export function toCsv(rows: readonly object[]): string {
  if (rows.length === 0) {
    return '';
  }

  const columns = Object.keys(rows[0]);
  const lines = [columns.join(',')];
  for (const row of rows) {
    const cells = new Map<string, unknown>(Object.entries(row));
    lines.push(columns.map((column) => escapeCell(cells.get(column))).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

import { scanLine } from './rowMatcher';
import type { ExamChunk } from './segmenter';
import type { MetadataTemplate } from './metadata';
import type {
  Accuracy,
  Exam,
  ExamSummary,
  QuestionResult,
  RowDiagnostic,
} from '../types/results';

export type QuestionOrder = 'appearance' | 'number';

export interface AssembleOptions {
  template: MetadataTemplate;
  /** Row order in the result; `number` normalises two-column renderings */
  order?: QuestionOrder;
}

/**
 * Count correct answers over a list of graded questions.
 */
export function summarizeAccuracy(questions: readonly QuestionResult[]): Accuracy {
  const total = questions.length;
  const correct = questions.filter((q) => q.is_correct).length;
  return {
    total,
    correct,
    incorrect: total - correct,
    accuracy: total > 0 ? correct / total : 0,
  };
}

// Element exams have 35 or 50 questions; anything past this is a misread
const MAX_EXAM_QUESTIONS = 100;

/**
 * Check question numbering against 1..N, where N is the reported total when
 * the report states a plausible one and the highest parsed number otherwise,
 * never more than MAX_EXAM_QUESTIONS.
 */
function checkNumbering(
  questions: readonly QuestionResult[],
  reportedTotal: number | undefined
): Pick<ExamSummary, 'missing_numbers' | 'duplicate_numbers' | 'unexpected_numbers'> {
  const missing: number[] = [];
  const duplicates: number[] = [];
  const unexpected: number[] = [];

  if (questions.length === 0) {
    return { missing_numbers: missing, duplicate_numbers: duplicates, unexpected_numbers: unexpected };
  }

  const seen = new Set<number>();
  for (const { number } of questions) {
    if (seen.has(number) && !duplicates.includes(number)) {
      duplicates.push(number);
    }
    seen.add(number);
  }

  const statedTotal =
    reportedTotal !== undefined && reportedTotal <= MAX_EXAM_QUESTIONS ? reportedTotal : undefined;
  const expectedTotal = Math.min(statedTotal ?? Math.max(...seen), MAX_EXAM_QUESTIONS);
  for (let n = 1; n <= expectedTotal; n++) {
    if (!seen.has(n)) {
      missing.push(n);
    }
  }
  for (const n of Array.from(seen).sort((a, b) => a - b)) {
    if (n < 1 || n > expectedTotal) {
      unexpected.push(n);
    }
  }

  return { missing_numbers: missing, duplicate_numbers: duplicates, unexpected_numbers: unexpected };
}

/**
 * Build one exam from its chunk: metadata from the whole chunk, rows from the
 * body lines in the order they appear.
 */
export function assembleExam(chunk: ExamChunk, options: AssembleOptions): Exam {
  const { template, order = 'appearance' } = options;
  const allLines = [...chunk.headerLines, ...chunk.bodyLines];
  const metadata = template.extract(`${allLines.join('\n')}\n`);

  const found: QuestionResult[] = [];
  const diagnostics: RowDiagnostic[] = [];
  const bodyStart = chunk.startLine + chunk.headerLines.length;

  chunk.bodyLines.forEach((line, i) => {
    const scan = scanLine(line, bodyStart + i);
    found.push(...scan.rows);
    diagnostics.push(...scan.diagnostics);
  });

  // Array.prototype.sort is stable, so equal numbers keep appearance order
  const questions = Object.freeze(
    order === 'number' ? [...found].sort((a, b) => a.number - b.number) : found
  );

  return {
    metadata,
    summary: {
      ...summarizeAccuracy(questions),
      ...checkNumbering(questions, metadata.reported_total),
    },
    questions,
    diagnostics,
  };
}

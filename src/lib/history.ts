import type { Database } from 'better-sqlite3';
import { createHash } from 'crypto';
import { examsOf } from './source';
import type { ParsedSource } from './combiner';
import type { AttemptInsert, AttemptRecord, ImportRecord } from '../types/database';
import type { Accuracy, QuestionResult, SourceResult } from '../types/results';

export type RecordOutcome =
  | { status: 'recorded'; importId: number; attempts: number }
  | { status: 'duplicate'; importId: number; importedAt: string };

/**
 * Fingerprint of a source's graded content, independent of its file name,
 * so the same report imported from two paths is recognized.
 */
export function contentHash(result: SourceResult): string {
  const exams = examsOf(result).map((exam) => ({
    metadata: exam.metadata,
    questions: exam.questions,
  }));
  return createHash('sha256').update(JSON.stringify(exams)).digest('hex');
}

/**
 * Store every graded question of a parsed source in one transaction.
 * A source whose content is already stored is left alone.
 */
export function recordSource(db: Database, { source, result }: ParsedSource): RecordOutcome {
  const hash = contentHash(result);

  const existing = db
    .prepare<[string], Pick<ImportRecord, 'id' | 'imported_at'>>(
      'SELECT id, imported_at FROM imports WHERE content_hash = ?'
    )
    .get(hash);
  if (existing) {
    return { status: 'duplicate', importId: existing.id, importedAt: existing.imported_at };
  }

  const exams = examsOf(result);
  const insertImport = db.prepare<[string, string, number]>(
    'INSERT INTO imports (source, content_hash, exam_count) VALUES (?, ?, ?)'
  );
  const insertAttempt = db.prepare<[number, number, number, string, string, string, number]>(`
    INSERT INTO attempts (import_id, exam_index, number, question_id, selected_answer, correct_answer, is_correct)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const run = db.transaction((): RecordOutcome => {
    const importId = Number(insertImport.run(source, hash, exams.length).lastInsertRowid);
    let attempts = 0;

    exams.forEach((exam, examIndex) => {
      for (const q of exam.questions) {
        const attempt: AttemptInsert = {
          import_id: importId,
          exam_index: examIndex + 1,
          number: q.number,
          question_id: q.question_id,
          selected_answer: q.selected,
          correct_answer: q.correct,
          is_correct: q.is_correct,
        };
        insertAttempt.run(
          attempt.import_id,
          attempt.exam_index,
          attempt.number,
          attempt.question_id,
          attempt.selected_answer,
          attempt.correct_answer,
          attempt.is_correct ? 1 : 0
        );
        attempts++;
      }
    });

    return { status: 'recorded', importId, attempts };
  });

  return run();
}

/**
 * All recorded questions in the order they were stored.
 */
export function loadHistoryQuestions(db: Database): QuestionResult[] {
  const rows = db
    .prepare<[], Pick<AttemptRecord, 'number' | 'question_id' | 'selected_answer' | 'correct_answer' | 'is_correct'>>(`
      SELECT number, question_id, selected_answer, correct_answer, is_correct
      FROM attempts
      ORDER BY id
    `)
    .all();

  return rows.map((row) => ({
    number: row.number,
    question_id: row.question_id,
    selected: row.selected_answer,
    correct: row.correct_answer,
    is_correct: row.is_correct === 1,
  }));
}

/**
 * Overall totals of the recorded history.
 */
export function getHistorySummary(db: Database): Accuracy & { imports: number } {
  const imports = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM imports').get();
  const overall = db
    .prepare<[], { total_attempts: number; correct_attempts: number | null }>(`
      SELECT
        COUNT(*) as total_attempts,
        SUM(is_correct) as correct_attempts
      FROM attempts
    `)
    .get();

  const total = overall?.total_attempts ?? 0;
  const correct = overall?.correct_attempts ?? 0;

  return {
    imports: imports?.count ?? 0,
    total,
    correct,
    incorrect: total - correct,
    accuracy: total > 0 ? correct / total : 0,
  };
}

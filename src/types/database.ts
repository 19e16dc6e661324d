/**
 * Types for attempt history records
 */

/** One imported source */
export interface ImportRecord {
  id: number;
  source: string;
  content_hash: string;
  exam_count: number;
  imported_at: string;
}

/** A graded question row as stored */
export interface AttemptRecord {
  id: number;
  import_id: number;
  /** 1-based position of the exam within its source, as in the CSV export */
  exam_index: number;
  number: number;
  question_id: string;
  selected_answer: string;
  correct_answer: string;
  is_correct: number;
}

/** Insert data for a new attempt */
export interface AttemptInsert {
  import_id: number;
  exam_index: number;
  number: number;
  question_id: string;
  selected_answer: string;
  correct_answer: string;
  is_correct: boolean;
}

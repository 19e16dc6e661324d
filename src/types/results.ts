/**
 * Types for parsed ham radio exam result reports
 */

/** One graded question row, e.g. "17. T5B04: D (should be A)" */
export interface QuestionResult {
  /** Position within its exam (1-based, not globally unique) */
  readonly number: number;
  /** Question pool identifier, e.g. "T3A04" */
  readonly question_id: string;
  /** The candidate's answer letter */
  readonly selected: string;
  /** The key's answer letter; equals `selected` when the row has no correction */
  readonly correct: string;
  readonly is_correct: boolean;
}

/** Header and footer fields of one exam. Every field is best-effort. */
export interface ExamMetadata {
  candidate_name?: string;
  pin?: string;
  outcome?: 'PASS' | 'FAIL';
  reported_correct?: number;
  reported_total?: number;
  /** License element number, e.g. 2 for Technician */
  element?: number;
  test_number?: string;
  valid_from?: string;
  valid_to?: string;
  exam_started_at?: string;
  exam_started_by?: string;
  exam_graded_at?: string;
  exam_graded_by?: string;
}

export type DiagnosticKind = 'malformed-row' | 'contradictory-correction';

/** A line the row matcher could not take at face value */
export interface RowDiagnostic {
  /** 1-based line number within the source text */
  line_number: number;
  line: string;
  kind: DiagnosticKind;
  message: string;
}

export interface Accuracy {
  total: number;
  correct: number;
  incorrect: number;
  /** correct / total, 0 when total is 0 */
  accuracy: number;
}

export interface ExamSummary extends Accuracy {
  missing_numbers: number[];
  duplicate_numbers: number[];
  unexpected_numbers: number[];
}

export interface Exam {
  metadata: ExamMetadata;
  summary: ExamSummary;
  questions: readonly QuestionResult[];
  diagnostics: RowDiagnostic[];
}

/** A source holding exactly one exam, flattened to the top level */
export interface SingleExamSource extends Exam {
  source: string;
}

export interface MultiExamSummary extends Accuracy {
  total_exams: number;
}

/** A source holding several concatenated exams */
export interface MultiExamSource {
  source: string;
  metadata: Pick<ExamMetadata, 'candidate_name' | 'pin'>;
  summary: MultiExamSummary;
  exams: Exam[];
}

export type SourceResult = SingleExamSource | MultiExamSource;

export interface StatCounts {
  attempts: number;
  correct: number;
  incorrect: number;
  /** correct / attempts, unrounded */
  accuracy: number;
}

export interface QuestionStatEntry extends StatCounts {
  question_id: string;
}

export interface SectionStatEntry extends StatCounts {
  /** Element letter plus section digit, e.g. "T3" */
  section_id: string;
}

export interface SubsectionStatEntry extends StatCounts {
  /** Section plus subsection letter, e.g. "T3A" */
  subsection_id: string;
}

export interface StatTables {
  question_stats: QuestionStatEntry[];
  section_stats: SectionStatEntry[];
  subsection_stats: SubsectionStatEntry[];
}

/** A source that produced no result at all */
export interface SourceFailure {
  source: string;
  error: string;
}

export interface AggregateSummary extends Accuracy {
  total_sources: number;
  total_failed_sources: number;
  total_exams: number;
}

/** One parsed source inside a combined result, under its unique identifier */
export interface SourceResultEntry {
  source: string;
  result: SourceResult;
}

/** Combined output of a run over several sources */
export interface AggregateResult extends StatTables {
  sources: string[];
  failed_sources: SourceFailure[];
  summary: AggregateSummary;
  /** In input order; identifiers such as "2" or "10" must not be reordered */
  results: SourceResultEntry[];
}

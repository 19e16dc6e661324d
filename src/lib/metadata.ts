import type { ExamMetadata } from '../types/results';

/**
 * A report layout: how one exam's header is recognized and how its fields are
 * read. Layouts other than the default can be supplied to the parser.
 */
export interface MetadataTemplate {
  name: string;
  /** True when the line opens a new exam in a concatenated document */
  isBoundary(line: string): boolean;
  extract(text: string): ExamMetadata;
}

const CANDIDATE_HEADER = /^\s*(.+?)\s+\(PIN:\s*(\d+)\)\s*$/;

/**
 * The session result report: a "<candidate> (PIN: 1234)" header, the graded
 * rows, and "Exam started/graded at ... by ..." footer lines.
 */
export const pinReportTemplate: MetadataTemplate = {
  name: 'pin-report',

  isBoundary(line: string): boolean {
    return CANDIDATE_HEADER.test(line);
  },

  extract(text: string): ExamMetadata {
    const metadata: ExamMetadata = {};

    const header = text.match(new RegExp(CANDIDATE_HEADER.source, 'm'));
    if (header) {
      metadata.candidate_name = header[1].trim();
      metadata.pin = header[2];
    }

    const outcome = text.match(/\b(FAIL|PASS)\b/);
    if (outcome) {
      metadata.outcome = outcome[1] === 'PASS' ? 'PASS' : 'FAIL';
    }

    const score = text.match(/Test\s+(?:Failed|Passed)\s+-\s+(\d+)\s+out of\s+(\d+)/);
    if (score) {
      metadata.reported_correct = parseInt(score[1], 10);
      metadata.reported_total = parseInt(score[2], 10);
    }

    const element = text.match(/Element\s+(\d+)/);
    if (element) {
      metadata.element = parseInt(element[1], 10);
    }

    const testNumber = text.match(/Test\s+#(\d+)/);
    if (testNumber) {
      metadata.test_number = testNumber[1];
    }

    const validity = text.match(/valid\s+(.+?)\s+—\s+(.+?)\n/);
    if (validity) {
      metadata.valid_from = validity[1].trim();
      metadata.valid_to = validity[2].trim();
    }

    const started = text.match(/Exam started at\s+(.+?)\s+by\s+(\S+)/);
    if (started) {
      metadata.exam_started_at = started[1].trim();
      metadata.exam_started_by = started[2];
    }

    const graded = text.match(/Exam graded at\s+(.+?)\s+by\s+(\S+)/);
    if (graded) {
      metadata.exam_graded_at = graded[1].trim();
      metadata.exam_graded_by = graded[2];
    }

    return metadata;
  },
};

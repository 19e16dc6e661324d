import { assembleExam, summarizeAccuracy } from './assembler';
import type { QuestionOrder } from './assembler';
import { pinReportTemplate } from './metadata';
import type { MetadataTemplate } from './metadata';
import { segmentExams } from './segmenter';
import type { Exam, MultiExamSource, QuestionResult, SourceResult } from '../types/results';

export interface ParseOptions {
  template?: MetadataTemplate;
  order?: QuestionOrder;
}

/**
 * Parse the full text of one source.
 * A single exam is flattened to the top level; several exams are kept under `exams`.
 */
export function parseSource(source: string, text: string, options: ParseOptions = {}): SourceResult {
  const template = options.template ?? pinReportTemplate;
  const exams = segmentExams(text, template).map((chunk) =>
    assembleExam(chunk, { template, order: options.order })
  );

  if (exams.length === 1) {
    return { source, ...exams[0] };
  }

  const first = exams[0].metadata;
  const metadata: MultiExamSource['metadata'] = {};
  if (first.candidate_name !== undefined) {
    metadata.candidate_name = first.candidate_name;
  }
  if (first.pin !== undefined) {
    metadata.pin = first.pin;
  }

  return {
    source,
    metadata,
    summary: {
      total_exams: exams.length,
      ...summarizeAccuracy(exams.flatMap((exam) => exam.questions)),
    },
    exams,
  };
}

export function isMultiExam(result: SourceResult): result is MultiExamSource {
  return 'exams' in result;
}

/**
 * The exams of a source, whichever shape it was returned in.
 */
export function examsOf(result: SourceResult): Exam[] {
  if (isMultiExam(result)) {
    return result.exams;
  }
  const { metadata, summary, questions, diagnostics } = result;
  return [{ metadata, summary, questions, diagnostics }];
}

export function questionsOf(result: SourceResult): QuestionResult[] {
  return examsOf(result).flatMap((exam) => exam.questions);
}

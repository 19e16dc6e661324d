import { hasRowPrefix } from './rowMatcher';
import type { MetadataTemplate } from './metadata';

/** The lines of one exam, split where its question rows begin */
export interface ExamChunk {
  /** 0-based position of the exam within its source */
  index: number;
  /** 1-based line number of the chunk's first line in the source text */
  startLine: number;
  headerLines: string[];
  bodyLines: string[];
}

type SegmenterState =
  | { kind: 'BeforeFirstExam'; lines: string[] }
  | { kind: 'InExam'; chunks: ExamChunk[]; current: ExamChunk };

function openChunk(index: number, startLine: number, boundaryLine: string): ExamChunk {
  return { index, startLine, headerLines: [boundaryLine], bodyLines: [] };
}

function appendLine(chunk: ExamChunk, line: string): void {
  if (chunk.bodyLines.length > 0 || hasRowPrefix(line)) {
    chunk.bodyLines.push(line);
  } else {
    chunk.headerLines.push(line);
  }
}

function step(
  state: SegmenterState,
  line: string,
  lineNumber: number,
  template: MetadataTemplate
): SegmenterState {
  const boundary = template.isBoundary(line);

  if (state.kind === 'BeforeFirstExam') {
    if (boundary) {
      // Anything before the first header is page furniture
      return { kind: 'InExam', chunks: [], current: openChunk(0, lineNumber, line) };
    }
    state.lines.push(line);
    return state;
  }

  if (boundary) {
    const chunks = [...state.chunks, state.current];
    return { kind: 'InExam', chunks, current: openChunk(chunks.length, lineNumber, line) };
  }

  appendLine(state.current, line);
  return state;
}

/**
 * Split the text of one source into exams.
 *
 * A boundary line (per the template) opens a new exam; every line up to the
 * next boundary belongs to it. Text with no boundary at all is one exam.
 */
export function segmentExams(text: string, template: MetadataTemplate): ExamChunk[] {
  const lines = text.split(/\r?\n/);
  let state: SegmenterState = { kind: 'BeforeFirstExam', lines: [] };

  for (let i = 0; i < lines.length; i++) {
    state = step(state, lines[i], i + 1, template);
  }

  if (state.kind === 'InExam') {
    return [...state.chunks, state.current];
  }

  const whole: ExamChunk = { index: 0, startLine: 1, headerLines: [], bodyLines: [] };
  for (const line of state.lines) {
    appendLine(whole, line);
  }
  return [whole];
}

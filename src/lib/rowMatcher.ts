import type { QuestionResult, RowDiagnostic } from '../types/results';

// "17. T5B04: D" with an optional "(should be A)". The question id is the
// element letter, section digit, subsection letter and a two-digit number.
// The answer part is optional so that a number and question id without a
// usable answer still match and can be reported.
const ROW_SOURCE =
  String.raw`(\d+)\.\s*([A-Z]\d[A-Z]\d{2})\b(?::\s*([A-Z])\b(?:\s*\(\s*should be\s*([A-Z])\s*\))?)?`;

const LEADING_PREFIX = new RegExp(String.raw`^\s*(\d+)\.\s*([A-Z]\d[A-Z]\d{2})\b`);

// Two-column reports separate the columns with a run of spaces or a tab
const COLUMN_GAP = /(?:\s{2,}|\t)$/;

export interface LineScan {
  rows: QuestionResult[];
  diagnostics: RowDiagnostic[];
}

interface LocatedRow {
  start: number;
  row: QuestionResult;
}

interface LocatedScan {
  rows: LocatedRow[];
  diagnostics: RowDiagnostic[];
}

function toQuestionResult(
  numberText: string,
  questionId: string,
  selected: string,
  shouldBe: string | undefined
): QuestionResult {
  const correct = shouldBe ?? selected;
  return Object.freeze({
    number: parseInt(numberText, 10),
    question_id: questionId,
    selected,
    correct,
    is_correct: selected === correct,
  });
}

/**
 * A row counts only where a column starts: at the beginning of the line, or
 * after a column gap that follows an earlier row on the same line.
 */
function startsColumn(line: string, index: number, afterRow: boolean): boolean {
  const before = line.slice(0, index);
  return before.trim() === '' || (afterRow && COLUMN_GAP.test(before));
}

function scanRows(line: string, lineNumber: number): LocatedScan {
  const rows: LocatedRow[] = [];
  const diagnostics: RowDiagnostic[] = [];
  let afterRow = false;

  for (const match of line.matchAll(new RegExp(ROW_SOURCE, 'g'))) {
    const start = match.index ?? 0;
    if (!startsColumn(line, start, afterRow)) {
      continue;
    }
    afterRow = true;

    const [text, numberText, questionId, selected, shouldBe] = match;
    if (selected === undefined) {
      diagnostics.push({
        line_number: lineNumber,
        line,
        kind: 'malformed-row',
        message: `Question ${numberText} (${questionId}) has no recognizable answer`,
      });
      continue;
    }

    if (shouldBe !== undefined && shouldBe === selected) {
      diagnostics.push({
        line_number: lineNumber,
        line,
        kind: 'contradictory-correction',
        message: `${questionId}: correction "${shouldBe}" equals the selected answer in "${text.trim()}"`,
      });
    }

    rows.push({ start, row: toQuestionResult(numberText, questionId, selected, shouldBe) });
  }

  return { rows, diagnostics };
}

/**
 * Match a single question row at the start of a line.
 * Returns null for anything that is not a row; never throws.
 *
 * This is the first-column row `scanLine` finds on the same line.
 */
export function matchRow(line: string): QuestionResult | null {
  const [first] = scanRows(line, 0).rows;
  if (first === undefined || line.slice(0, first.start).trim() !== '') {
    return null;
  }
  return first.row;
}

/** True when the line starts with at least the number and question id of a row */
export function hasRowPrefix(line: string): boolean {
  return LEADING_PREFIX.test(line);
}

/**
 * Find every question row on a line.
 *
 * Reports rendered in two columns put two rows side by side, so a line may
 * hold more than one. Rows that start like a question but carry no answer
 * letter are reported as `malformed-row`; a correction naming the selected
 * answer is reported as `contradictory-correction` and the row is kept.
 * Text that merely mentions a row in the middle of a sentence is ignored.
 */
export function scanLine(line: string, lineNumber: number): LineScan {
  const { rows, diagnostics } = scanRows(line, lineNumber);
  return { rows: rows.map((r) => r.row), diagnostics };
}

/** Section id, e.g. "T3" for "T3A04" */
export function sectionOf(questionId: string): string {
  return questionId.slice(0, 2);
}

/** Subsection id, e.g. "T3A" for "T3A04" */
export function subsectionOf(questionId: string): string {
  return questionId.slice(0, 3);
}

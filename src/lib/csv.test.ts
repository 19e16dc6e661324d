import { flattenQuestionRows, roundStats, toCsv } from './csv';
import { aggregateStats } from './examStats';
import { parseSource, questionsOf } from './source';

const TWO_EXAMS = [
  'Jane Example (PIN: 4821)',
  'Element 2 Test #3001',
  '1. T1A01: A',
  'Jane Example (PIN: 4821)',
  'Test #3002',
  '1. T5B01: D (should be B)',
].join('\n');

describe('flattenQuestionRows', () => {
  it('emits one row per question with its exam position', () => {
    const rows = flattenQuestionRows([
      { source: 'jane.txt', result: parseSource('jane.txt', TWO_EXAMS) },
    ]);

    expect(rows).toEqual([
      {
        source: 'jane.txt',
        exam_index_in_source: 1,
        test_number: '3001',
        element: 2,
        number: 1,
        question_id: 'T1A01',
        selected: 'A',
        correct: 'A',
        is_correct: true,
      },
      {
        source: 'jane.txt',
        exam_index_in_source: 2,
        test_number: '3002',
        element: '',
        number: 1,
        question_id: 'T5B01',
        selected: 'D',
        correct: 'B',
        is_correct: false,
      },
    ]);
  });
});

describe('toCsv', () => {
  it('writes a header from the first row and quotes where needed', () => {
    const csv = toCsv([
      { source: 'a,b.txt', note: 'say "hi"', ok: true },
      { source: 'plain.txt', note: 'line\nbreak', ok: false },
    ]);

    expect(csv).toBe(
      'source,note,ok\r\n"a,b.txt","say ""hi""",true\r\nplain.txt,"line\nbreak",false\r\n'
    );
  });

  it('is empty for no rows', () => {
    expect(toCsv([])).toBe('');
  });

  it('serializes stat tables with rounded accuracy', () => {
    const stats = aggregateStats(
      questionsOf(
        parseSource('x.txt', ['1. G2B01: A', '2. G2B02: B', '3. G2B03: C (should be A)'].join('\n'))
      )
    );

    expect(toCsv(roundStats(stats.section_stats))).toBe(
      'section_id,attempts,correct,incorrect,accuracy\r\nG2,3,2,1,0.6667\r\n'
    );
  });
});

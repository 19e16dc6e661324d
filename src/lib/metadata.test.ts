import * as fs from 'fs';
import * as path from 'path';
import { pinReportTemplate } from './metadata';

const SINGLE_EXAM = fs.readFileSync(path.join(__dirname, '__fixtures__', 'single-exam.txt'), 'utf-8');

describe('pinReportTemplate', () => {
  it('reads every header and footer field of a report', () => {
    expect(pinReportTemplate.extract(SINGLE_EXAM)).toEqual({
      candidate_name: 'Jane Example',
      pin: '4821',
      outcome: 'FAIL',
      reported_correct: 3,
      reported_total: 5,
      element: 2,
      test_number: '3001',
      valid_from: '2026-07-01',
      valid_to: '2030-06-30',
      exam_started_at: '2026-09-12 09:05',
      exam_started_by: 'W1VE',
      exam_graded_at: '2026-09-12 09:40',
      exam_graded_by: 'K2VE',
    });
  });

  it('leaves out fields the text does not carry', () => {
    expect(pinReportTemplate.extract('Element 3\nPASS\n')).toEqual({
      element: 3,
      outcome: 'PASS',
    });
    expect(pinReportTemplate.extract('')).toEqual({});
  });

  it('recognizes the candidate header as an exam boundary', () => {
    expect(pinReportTemplate.isBoundary('Jane Example (PIN: 4821)')).toBe(true);
    expect(pinReportTemplate.isBoundary('  Jane Example   (PIN:4821)  ')).toBe(true);
    expect(pinReportTemplate.isBoundary('(PIN: 4821)')).toBe(false);
    expect(pinReportTemplate.isBoundary('Jane Example (PIN: unknown)')).toBe(false);
  });
});

import { parseArgs } from './args';
import { ArgumentError } from '../../src/lib/errors';

describe('parseArgs', () => {
  it('applies defaults', () => {
    expect(parseArgs(['exam.pdf'])).toEqual({
      inputs: ['exam.pdf'],
      inputType: 'auto',
      out: undefined,
      csv: undefined,
      statsCsv: undefined,
      sectionStatsCsv: undefined,
      subsectionStatsCsv: undefined,
      pretty: false,
      order: 'appearance',
      strict: false,
      quiet: false,
      db: undefined,
      historyStats: undefined,
    });
  });

  it('reads every option', () => {
    const args = parseArgs([
      'a.txt',
      '--input-type=text',
      'b.txt',
      '--out=out/result.json',
      '--csv=rows.csv',
      '--stats-csv=questions.csv',
      '--section-stats-csv=sections.csv',
      '--subsection-stats-csv=subsections.csv',
      '--pretty',
      '--order=number',
      '--strict',
      '--quiet',
      '--db=data/history.db',
      '--history-stats=history.json',
    ]);

    expect(args).toEqual({
      inputs: ['a.txt', 'b.txt'],
      inputType: 'text',
      out: 'out/result.json',
      csv: 'rows.csv',
      statsCsv: 'questions.csv',
      sectionStatsCsv: 'sections.csv',
      subsectionStatsCsv: 'subsections.csv',
      pretty: true,
      order: 'number',
      strict: true,
      quiet: true,
      db: 'data/history.db',
      historyStats: 'history.json',
    });
  });

  it('requires an input', () => {
    expect(() => parseArgs(['--pretty'])).toThrow('At least one input file is required');
  });

  it('rejects unknown options and bad values', () => {
    expect(() => parseArgs(['a.txt', '--verbose'])).toThrow(ArgumentError);
    expect(() => parseArgs(['a.txt', '--pretty=yes'])).toThrow('Unknown option: --pretty=yes');
    expect(() => parseArgs(['a.txt', '--out'])).toThrow('--out needs a value: --out=<value>');
    expect(() => parseArgs(['a.txt', '--input-type=docx'])).toThrow(
      '--input-type must be auto, pdf or text, got "docx"'
    );
    expect(() => parseArgs(['a.txt', '--order=random'])).toThrow(
      '--order must be appearance or number, got "random"'
    );
  });
});

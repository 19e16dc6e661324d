import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      ghostscriptBin: 'gs',
      pdfTextTimeoutMs: 60000,
      historyDbPath: null,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({
        GHOSTSCRIPT_BIN: '/opt/gs/bin/gs',
        PDF_TEXT_TIMEOUT_MS: '1500',
        EXAM_HISTORY_DB: 'data/history.db',
      })
    ).toEqual({
      ghostscriptBin: '/opt/gs/bin/gs',
      pdfTextTimeoutMs: 1500,
      historyDbPath: 'data/history.db',
    });
  });

  it('rejects a timeout that is not a positive integer', () => {
    expect(() => loadConfig({ PDF_TEXT_TIMEOUT_MS: 'soon' })).toThrow(
      'Environment variable "PDF_TEXT_TIMEOUT_MS" must be a positive integer, got "soon"'
    );
    expect(() => loadConfig({ PDF_TEXT_TIMEOUT_MS: '0' })).toThrow(/positive integer/);
  });
});

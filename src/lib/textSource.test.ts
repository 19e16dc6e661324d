import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InputUnavailableError } from './errors';
import { createFileLoader, renderPdfWithGhostscript, resolveInputType } from './textSource';

describe('resolveInputType', () => {
  it('picks pdf by extension in auto mode', () => {
    expect(resolveInputType('exam.PDF', 'auto')).toBe('pdf');
    expect(resolveInputType('exam.txt', 'auto')).toBe('text');
    expect(resolveInputType('exam', 'auto')).toBe('text');
  });

  it('honours an explicit type', () => {
    expect(resolveInputType('exam.pdf', 'text')).toBe('text');
    expect(resolveInputType('exam.txt', 'pdf')).toBe('pdf');
  });
});

describe('createFileLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exam-results-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads text files directly', async () => {
    const file = path.join(dir, 'exam.txt');
    fs.writeFileSync(file, '1. T1A01: A\n', 'utf-8');
    const renderPdf = jest.fn(async () => 'unused');

    await expect(createFileLoader('auto', renderPdf)(file)).resolves.toBe('1. T1A01: A\n');
    expect(renderPdf).not.toHaveBeenCalled();
  });

  it('sends pdf files through the renderer', async () => {
    const file = path.join(dir, 'exam.pdf');
    fs.writeFileSync(file, '%PDF-1.4', 'utf-8');
    const renderPdf = jest.fn(async (pdfPath: string) => `rendered ${path.basename(pdfPath)}`);

    await expect(createFileLoader('auto', renderPdf)(file)).resolves.toBe('rendered exam.pdf');
    expect(renderPdf).toHaveBeenCalledWith(file);
  });

  it('fails with InputUnavailableError for a missing file', async () => {
    const file = path.join(dir, 'missing.txt');
    const load = createFileLoader('auto', async () => '');

    await expect(load(file)).rejects.toBeInstanceOf(InputUnavailableError);
    await expect(load(file)).rejects.toMatchObject({
      source: file,
      code: 'INPUT_UNAVAILABLE',
      message: `${file}: Input not found`,
    });
  });
});

describe('renderPdfWithGhostscript', () => {
  let dir: string;

  // Writes an executable shell script that stands in for Ghostscript
  function fakeGhostscript(name: string, body: string): string {
    const bin = path.join(dir, name);
    fs.writeFileSync(bin, `#!/bin/sh\n${body}\n`, { encoding: 'utf-8', mode: 0o755 });
    return bin;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'exam-results-gs-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns what Ghostscript writes to stdout', async () => {
    const render = renderPdfWithGhostscript({
      ghostscriptBin: fakeGhostscript('gs-echo', 'echo "$@"'),
      pdfTextTimeoutMs: 5000,
    });

    await expect(render('exam.pdf')).resolves.toBe('-q -sDEVICE=txtwrite -o - exam.pdf\n');
  });

  it('reports a non-zero exit with the stderr text', async () => {
    const render = renderPdfWithGhostscript({
      ghostscriptBin: fakeGhostscript('gs-fail', 'echo "Unrecoverable error in exam.pdf" >&2\nexit 1'),
      pdfTextTimeoutMs: 5000,
    });

    await expect(render('exam.pdf')).rejects.toMatchObject({
      name: 'InputUnavailableError',
      source: 'exam.pdf',
      message: 'exam.pdf: Ghostscript failed to extract text: Unrecoverable error in exam.pdf',
    });
  });

  it('stops Ghostscript once the timeout passes', async () => {
    const render = renderPdfWithGhostscript({
      ghostscriptBin: fakeGhostscript('gs-hang', 'exec sleep 5'),
      pdfTextTimeoutMs: 100,
    });

    await expect(render('exam.pdf')).rejects.toMatchObject({
      name: 'InputUnavailableError',
      source: 'exam.pdf',
      message: 'exam.pdf: Ghostscript timed out after 100 ms',
    });
  });

  it('reports a missing Ghostscript binary as an unavailable input', async () => {
    const render = renderPdfWithGhostscript({
      ghostscriptBin: 'ghostscript-binary-that-does-not-exist',
      pdfTextTimeoutMs: 5000,
    });

    await expect(render('exam.pdf')).rejects.toMatchObject({
      name: 'InputUnavailableError',
      source: 'exam.pdf',
      message:
        'exam.pdf: Ghostscript (ghostscript-binary-that-does-not-exist) is required but was not found in PATH',
    });
  });
});

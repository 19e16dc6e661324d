import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { TextLoader } from './combiner';
import type { ExtractorConfig } from './config';
import { InputUnavailableError, errorMessage } from './errors';

export type InputType = 'auto' | 'pdf' | 'text';

export type PdfRenderer = (pdfPath: string) => Promise<string>;

export function resolveInputType(filePath: string, inputType: InputType): 'pdf' | 'text' {
  if (inputType !== 'auto') {
    return inputType;
  }
  return path.extname(filePath).toLowerCase() === '.pdf' ? 'pdf' : 'text';
}

/**
 * Render a PDF to plain text with Ghostscript's txtwrite device.
 */
export function renderPdfWithGhostscript(
  config: Pick<ExtractorConfig, 'ghostscriptBin' | 'pdfTextTimeoutMs'>
): PdfRenderer {
  return (pdfPath) =>
    new Promise((resolve, reject) => {
      const proc = spawn(config.ghostscriptBin, ['-q', '-sDEVICE=txtwrite', '-o', '-', pdfPath], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString('utf-8');
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString('utf-8');
      });

      const timeout = setTimeout(() => {
        proc.kill('SIGTERM');
        reject(
          new InputUnavailableError(pdfPath, `Ghostscript timed out after ${config.pdfTextTimeoutMs} ms`)
        );
      }, config.pdfTextTimeoutMs);

      proc.on('close', (code) => {
        clearTimeout(timeout);
        if (code !== 0) {
          reject(
            new InputUnavailableError(pdfPath, `Ghostscript failed to extract text: ${stderr.trim()}`)
          );
        } else {
          resolve(stdout);
        }
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        clearTimeout(timeout);
        const message =
          err.code === 'ENOENT'
            ? `Ghostscript (${config.ghostscriptBin}) is required but was not found in PATH`
            : `Could not run Ghostscript: ${err.message}`;
        reject(new InputUnavailableError(pdfPath, message));
      });
    });
}

async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new InputUnavailableError(filePath, errorMessage(err));
  }
}

/**
 * Loader for file inputs: PDFs go through the renderer, anything else is read as UTF-8.
 */
export function createFileLoader(inputType: InputType, renderPdf: PdfRenderer): TextLoader {
  return async (filePath) => {
    if (!fs.existsSync(filePath)) {
      throw new InputUnavailableError(filePath, 'Input not found');
    }
    return resolveInputType(filePath, inputType) === 'pdf'
      ? renderPdf(filePath)
      : readTextFile(filePath);
  };
}

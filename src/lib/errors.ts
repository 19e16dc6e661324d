import type { SourceFailure } from '../types/results';

/** A named source could not be read or rendered to text */
export class InputUnavailableError extends Error {
  public readonly code = 'INPUT_UNAVAILABLE';
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'InputUnavailableError';
    this.source = source;
  }
}

/** Every source of a run failed, so there is nothing to combine */
export class AllSourcesFailedError extends Error {
  public readonly code = 'ALL_SOURCES_FAILED';
  public readonly failures: SourceFailure[];

  constructor(failures: SourceFailure[]) {
    super(`All ${failures.length} sources failed: ${failures.map((f) => f.source).join(', ')}`);
    this.name = 'AllSourcesFailedError';
    this.failures = failures;
  }
}

/** Invalid command-line usage */
export class ArgumentError extends Error {
  public readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

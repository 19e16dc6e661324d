import { summarizeAccuracy } from './assembler';
import { AllSourcesFailedError, errorMessage } from './errors';
import { aggregateStats } from './examStats';
import { examsOf, parseSource, questionsOf } from './source';
import type { ParseOptions } from './source';
import type { AggregateResult, SourceFailure, SourceResult, SourceResultEntry } from '../types/results';

export interface ParsedSource {
  source: string;
  result: SourceResult;
}

export type SourceOutcome =
  | ({ ok: true } & ParsedSource)
  | ({ ok: false } & SourceFailure);

export type TextLoader = (source: string) => Promise<string>;

/**
 * Load and parse every source concurrently.
 * Outcomes come back in input order whatever order the loads finish in.
 */
export async function parseSources(
  sources: string[],
  load: TextLoader,
  options: ParseOptions = {}
): Promise<SourceOutcome[]> {
  const settled = await Promise.allSettled(
    sources.map(async (source) => parseSource(source, await load(source), options))
  );

  return settled.map((outcome, i): SourceOutcome =>
    outcome.status === 'fulfilled'
      ? { ok: true, source: sources[i], result: outcome.value }
      : { ok: false, source: sources[i], error: errorMessage(outcome.reason) }
  );
}

export function splitOutcomes(outcomes: SourceOutcome[]): {
  parsed: ParsedSource[];
  failures: SourceFailure[];
} {
  const parsed: ParsedSource[] = [];
  const failures: SourceFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      parsed.push({ source: outcome.source, result: outcome.result });
    } else {
      failures.push({ source: outcome.source, error: outcome.error });
    }
  }
  return { parsed, failures };
}

function uniqueKey(source: string, used: Set<string>): string {
  let key = source;
  for (let n = 2; used.has(key); n++) {
    key = `${source}#${n}`;
  }
  used.add(key);
  return key;
}

/**
 * Combine parsed sources into one result with cross-source statistics.
 *
 * Failed sources are listed in `failed_sources` and counted in the summary;
 * they never disappear silently. Throws AllSourcesFailedError when no source
 * parsed at all.
 */
export function combineSources(
  parsed: ParsedSource[],
  failures: SourceFailure[] = []
): AggregateResult {
  if (parsed.length === 0 && failures.length > 0) {
    throw new AllSourcesFailedError(failures);
  }

  const used = new Set<string>();
  const results: SourceResultEntry[] = parsed.map(({ source, result }) => ({
    source: uniqueKey(source, used),
    result,
  }));

  const allQuestions = parsed.flatMap(({ result }) => questionsOf(result));
  const totalExams = parsed.reduce((sum, { result }) => sum + examsOf(result).length, 0);

  return {
    sources: results.map((entry) => entry.source),
    failed_sources: failures,
    summary: {
      total_sources: parsed.length + failures.length,
      total_failed_sources: failures.length,
      total_exams: totalExams,
      ...summarizeAccuracy(allQuestions),
    },
    ...aggregateStats(allQuestions),
    results,
  };
}

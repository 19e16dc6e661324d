#!/usr/bin/env node
/**
 * Convert ham radio exam result reports into structured JSON, CSV tables and
 * an optional attempt history.
 *
 * Single input: prints that source's parse result (one exam, or `exams` for
 * concatenated reports). Several inputs: prints one combined result with
 * per-question, per-section and per-subsection stats.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs, USAGE } from './args';
import type { Args } from './args';
import { combineSources, parseSources, splitOutcomes } from '../../src/lib/combiner';
import type { ParsedSource } from '../../src/lib/combiner';
import { loadConfig } from '../../src/lib/config';
import type { ExtractorConfig } from '../../src/lib/config';
import { flattenQuestionRows, roundStats, toCsv } from '../../src/lib/csv';
import { openDb } from '../../src/lib/db';
import { AllSourcesFailedError, ArgumentError } from '../../src/lib/errors';
import { aggregateStats } from '../../src/lib/examStats';
import { getHistorySummary, loadHistoryQuestions, recordSource } from '../../src/lib/history';
import { questionsOf } from '../../src/lib/source';
import { createFileLoader, renderPdfWithGhostscript } from '../../src/lib/textSource';
import type { PdfRenderer } from '../../src/lib/textSource';
import type { AggregateResult, SourceResult } from '../../src/types/results';

export interface RunDependencies {
  config: ExtractorConfig;
  renderPdf?: PdfRenderer;
  /** Receives the JSON document when --out is not given */
  stdout: (text: string) => void;
  log: (message: string) => void;
  warn: (message: string) => void;
}

function writeFile(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, content, 'utf-8');
}

function writeCsvFiles(args: Args, parsed: ParsedSource[], log: (message: string) => void): void {
  const allQuestions = parsed.flatMap(({ result }) => questionsOf(result));
  const stats = aggregateStats(allQuestions);

  const outputs: Array<[string | undefined, object[]]> = [
    [args.csv, flattenQuestionRows(parsed)],
    [args.statsCsv, roundStats(stats.question_stats)],
    [args.sectionStatsCsv, roundStats(stats.section_stats)],
    [args.subsectionStatsCsv, roundStats(stats.subsection_stats)],
  ];

  for (const [filePath, rows] of outputs) {
    if (!filePath) continue;
    if (rows.length === 0) {
      log(`No rows for ${filePath}, skipped`);
      continue;
    }
    writeFile(filePath, toCsv(rows));
    log(`Wrote ${rows.length} rows to ${filePath}`);
  }
}

function updateHistory(
  dbPath: string,
  historyStatsPath: string | undefined,
  parsed: ParsedSource[],
  log: (message: string) => void
): void {
  const db = openDb(dbPath);
  try {
    for (const entry of parsed) {
      const outcome = recordSource(db, entry);
      if (outcome.status === 'recorded') {
        log(`Recorded ${outcome.attempts} attempts from ${entry.source}`);
      } else {
        log(`Already recorded (${outcome.importedAt}), skipped: ${entry.source}`);
      }
    }

    if (historyStatsPath) {
      const history = {
        summary: getHistorySummary(db),
        ...aggregateStats(loadHistoryQuestions(db)),
      };
      writeFile(historyStatsPath, `${JSON.stringify(history, null, 2)}\n`);
      log(`Wrote history stats to ${historyStatsPath}`);
    }
  } finally {
    db.close();
  }
}

/**
 * Run the extractor. Returns the process exit code.
 */
export async function run(argv: string[], deps: RunDependencies): Promise<number> {
  let args: Args;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof ArgumentError) {
      deps.warn(`ERROR: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  const log: (message: string) => void = args.quiet ? () => undefined : deps.log;
  const dbPath = args.db ?? deps.config.historyDbPath;
  if (args.historyStats && !dbPath) {
    deps.warn('ERROR: --history-stats needs --db=<file> or EXAM_HISTORY_DB');
    return 2;
  }

  try {
    const renderPdf = deps.renderPdf ?? renderPdfWithGhostscript(deps.config);
    const loader = createFileLoader(args.inputType, renderPdf);

    log(`Parsing ${args.inputs.length} input(s)...`);
    const outcomes = await parseSources(args.inputs, loader, { order: args.order });
    const { parsed, failures } = splitOutcomes(outcomes);

    for (const failure of failures) {
      deps.warn(`WARNING: Could not parse ${failure.source}: ${failure.error}`);
    }
    if (args.strict && failures.length > 0) {
      throw new Error(`Aborted by --strict: ${failures[0].error}`);
    }
    if (parsed.length === 0) {
      throw new AllSourcesFailedError(failures);
    }

    for (const { source, result } of parsed) {
      const questions = questionsOf(result);
      log(`${source}: ${questions.length} questions parsed`);
    }

    const data: SourceResult | AggregateResult =
      args.inputs.length === 1 ? parsed[0].result : combineSources(parsed, failures);

    writeCsvFiles(args, parsed, log);

    if (dbPath) {
      updateHistory(dbPath, args.historyStats, parsed, log);
    }

    const json = JSON.stringify(data, null, args.pretty ? 2 : undefined);
    if (args.out) {
      writeFile(args.out, `${json}\n`);
      log(`Wrote JSON to ${args.out}`);
    } else {
      deps.stdout(json);
    }

    return 0;
  } catch (err) {
    const name = err instanceof Error ? err.name : 'Error';
    const message = err instanceof Error ? err.message : String(err);
    deps.warn(`ERROR: ${name}: ${message}`);
    return 1;
  }
}

async function main(): Promise<number> {
  // Progress goes to stderr so stdout stays clean JSON
  return run(process.argv.slice(2), {
    config: loadConfig(),
    stdout: (text) => console.log(text),
    log: (message) => console.error(message),
    warn: (message) => console.error(message),
  });
}

// CLI entry point
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error('Fatal error:', err);
      process.exit(1);
    });
}

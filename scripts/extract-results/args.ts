import { ArgumentError } from '../../src/lib/errors';
import type { QuestionOrder } from '../../src/lib/assembler';
import type { InputType } from '../../src/lib/textSource';

export interface Args {
  inputs: string[];
  inputType: InputType;
  out?: string;
  csv?: string;
  statsCsv?: string;
  sectionStatsCsv?: string;
  subsectionStatsCsv?: string;
  pretty: boolean;
  order: QuestionOrder;
  strict: boolean;
  quiet: boolean;
  db?: string;
  historyStats?: string;
}

export const USAGE = `Usage: extract-results <input...> [options]

Parse exam result reports (.pdf or plain text) into structured JSON.

Options:
  --input-type=auto|pdf|text      Input format (default: auto by extension)
  --out=<file>                    Write JSON here instead of stdout
  --csv=<file>                    CSV of parsed question rows
  --stats-csv=<file>              CSV of per-question stats
  --section-stats-csv=<file>      CSV of per-section stats (e.g. T3)
  --subsection-stats-csv=<file>   CSV of per-subsection stats (e.g. T3A)
  --pretty                        Pretty-print JSON
  --order=appearance|number       Question order within an exam (default: appearance)
  --strict                        Abort when any input fails
  --quiet                         No progress output
  --db=<file>                     Record parsed attempts in a history database
  --history-stats=<file>          Write stats over the whole history (needs a database)`;

const VALUE_FLAGS = [
  'input-type',
  'out',
  'csv',
  'stats-csv',
  'section-stats-csv',
  'subsection-stats-csv',
  'order',
  'db',
  'history-stats',
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

const SWITCHES = ['pretty', 'strict', 'quiet'] as const;

type Switch = (typeof SWITCHES)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function isSwitch(name: string): name is Switch {
  return SWITCHES.some((flag) => flag === name);
}

function parseInputType(value: string | undefined): InputType {
  if (value === undefined || value === 'auto' || value === 'pdf' || value === 'text') {
    return value ?? 'auto';
  }
  throw new ArgumentError(`--input-type must be auto, pdf or text, got "${value}"`);
}

function parseOrder(value: string | undefined): QuestionOrder {
  if (value === undefined || value === 'appearance' || value === 'number') {
    return value ?? 'appearance';
  }
  throw new ArgumentError(`--order must be appearance or number, got "${value}"`);
}

export function parseArgs(argv: string[]): Args {
  const inputs: string[] = [];
  const values: Partial<Record<ValueFlag, string>> = {};
  const switches = new Set<Switch>();

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      inputs.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (isSwitch(name) && eq === -1) {
      switches.add(name);
    } else if (isValueFlag(name)) {
      const value = eq === -1 ? '' : arg.slice(eq + 1);
      if (!value) {
        throw new ArgumentError(`--${name} needs a value: --${name}=<value>`);
      }
      values[name] = value;
    } else {
      throw new ArgumentError(`Unknown option: ${arg}`);
    }
  }

  if (inputs.length === 0) {
    throw new ArgumentError('At least one input file is required');
  }

  return {
    inputs,
    inputType: parseInputType(values['input-type']),
    out: values.out,
    csv: values.csv,
    statsCsv: values['stats-csv'],
    sectionStatsCsv: values['section-stats-csv'],
    subsectionStatsCsv: values['subsection-stats-csv'],
    pretty: switches.has('pretty'),
    order: parseOrder(values.order),
    strict: switches.has('strict'),
    quiet: switches.has('quiet'),
    db: values.db,
    historyStats: values['history-stats'],
  };
}

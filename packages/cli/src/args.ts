/**
 * Command line parsing for the tablediff binary
 */

export const USAGE = [
  'Usage: tablediff <a> <b> --original-file <path> [options]',
  '',
  'Compares table <a> with table <b>, both edited copies of the original table.',
  '',
  'Options:',
  '  --original-file <path>    Table both <a> and <b> were derived from (required)',
  '  -o, --output-path <path>  Where to write the differences report',
  '                            (default: <a>_comparison_<b>.csv)',
  '  --print-headers           Log the headers of all three tables before comparing',
  '  --settings <path>         Global settings file (default: settings.json)',
  '  -h, --help                Show this message',
].join('\n');

export interface CliArgs {
  a: string;
  b: string;
  originalFile: string;
  outputPath?: string;
  printHeaders: boolean;
  settingsPath?: string;
}

export type ParsedArgs = { kind: 'run'; args: CliArgs } | { kind: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ValueKey = 'originalFile' | 'outputPath' | 'settingsPath';

const VALUE_FLAGS = new Map<string, ValueKey>([
  ['--original-file', 'originalFile'],
  ['--output-path', 'outputPath'],
  ['-o', 'outputPath'],
  ['--settings', 'settingsPath'],
]);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const values: Partial<Record<ValueKey, string>> = {};
  let printHeaders = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '--print-headers') {
      printHeaders = true;
      continue;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS.get(flag);

    if (key) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (!value) throw new UsageError(`Missing value for ${flag}`);
      values[key] = value;
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  if (positional.length !== 2) {
    throw new UsageError(`Expected 2 tables to compare, got ${positional.length}`);
  }
  if (!values.originalFile) {
    throw new UsageError('Missing required option --original-file');
  }

  const [a = '', b = ''] = positional;
  return {
    kind: 'run',
    args: {
      a,
      b,
      originalFile: values.originalFile,
      outputPath: values.outputPath,
      printHeaders,
      settingsPath: values.settingsPath,
    },
  };
}

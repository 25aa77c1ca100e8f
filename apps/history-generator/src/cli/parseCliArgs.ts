import mri from 'mri';
import { GenerateMockDataCommand } from '@history/application/commands/GenerateMockDataCommand';
import { RunOptions } from '@config/run-options.module';
import {
  BOOLEAN_FLAGS,
  DEFAULT_COUNT,
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  STRING_FLAGS,
  cliOptionsSchema,
} from './cli-options.schema';

export type ParsedCli =
  | { kind: 'help' }
  | { kind: 'invalid'; issues: string[] }
  | { kind: 'run'; command: GenerateMockDataCommand; runOptions: RunOptions };

const KNOWN_FLAGS = new Set(['_', 'h', ...STRING_FLAGS, ...BOOLEAN_FLAGS]);

export function parseCliArgs(argv: string[]): ParsedCli {
  const raw = mri(argv, {
    boolean: BOOLEAN_FLAGS,
    string: STRING_FLAGS,
    alias: { h: 'help' },
  });

  const issues: string[] = [];
  for (const key of Object.keys(raw)) {
    if (!KNOWN_FLAGS.has(key)) issues.push(`Unknown option --${key}`);
  }
  if (raw._.length > 0) {
    issues.push(`Unexpected argument(s): ${raw._.join(' ')}`);
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (result.success && result.data.help) {
    return { kind: 'help' };
  }
  if (!result.success) {
    issues.push(...result.error.issues.map((issue) => issue.message));
  }
  if (issues.length > 0 || !result.success) {
    return { kind: 'invalid', issues };
  }

  const options = result.data;
  return {
    kind: 'run',
    command: {
      history: options.history,
      recent: options.recent,
      count: options.count ?? DEFAULT_COUNT,
      page: options.page ?? DEFAULT_PAGE,
      pageSize: options['page-size'] ?? DEFAULT_PAGE_SIZE,
      total: options.total,
      output: options.output,
      pretty: options.pretty,
    },
    runOptions: {
      seed: options.seed,
      distribution: options.distribution,
    },
  };
}

export const USAGE = `Usage: history-generator [options]

Generate synthetic crash-game history payloads shaped like the live API.

Options:
  --history              Generate the paged crash history envelope
  --recent               Generate the recent (flat list) envelope
                         Neither flag: generate both
  --count <n>            Minimum corpus size / recent record count (default: ${DEFAULT_COUNT})
  --page <n>             Page number (default: ${DEFAULT_PAGE})
  --page-size <n>        Page size (default: ${DEFAULT_PAGE_SIZE})
  --total <n>            Fix the dataset total instead of padding with jitter
  --output <path>        Output file (default: crash_history.json / recent_history.json)
  --pretty, --no-pretty  Indented or single-line JSON (default: pretty)
  --seed <n>             Seed the random source for reproducible output
  --distribution <name>  Crash tier selection: legacy | cumulative
  -h, --help             Show this help
`;

import { DEFAULT_REPORT_PATH } from '../locate/locator.js';

interface RunOptions {
  reportPath: string;
  json: boolean;
  help: boolean;
}

const USAGE = `Usage: choreo-report [report_path] [--json]

Summarise a choreo JSON test report.

Arguments:
  report_path  JSON report file or directory (default: ./${DEFAULT_REPORT_PATH})

Options:
  --json       Output as JSON
  -h, --help   Show this help
`;

function parseArgs(argv: string[]): RunOptions {
  const args = argv.slice(2);
  const options: RunOptions = {
    reportPath: DEFAULT_REPORT_PATH,
    json: false,
    help: false,
  };

  let positional: string | undefined;
  for (const value of args) {
    if (!value) {
      continue;
    }
    if (value === '--json') {
      options.json = true;
      continue;
    }
    if (value === '--help' || value === '-h') {
      options.help = true;
      continue;
    }
    if (value.startsWith('-')) {
      continue;
    }
    if (positional === undefined) {
      positional = value;
    }
  }

  if (positional !== undefined) {
    options.reportPath = positional;
  }
  return options;
}

export type { RunOptions };
export { parseArgs, USAGE };

import { loadReport } from '../load/loader.js';
import { locateReport } from '../locate/locator.js';
import { summarizeReport } from '../runtime/aggregate.js';
import type { ReportSummary } from '../runtime/types.js';
import { parseArgs, USAGE } from './args.js';
import type { RunOptions } from './args.js';
import { writeErr, writeOut } from './io.js';
import { formatJson, formatText } from './present.js';

interface RunResult {
  reportPath: string;
  summary: ReportSummary;
}

function runFromOptions(options: RunOptions): RunResult | null {
  if (options.help) {
    writeOut(USAGE);
    return null;
  }

  const reportPath = locateReport(options.reportPath);
  writeErr(`Report: ${reportPath}\n`);

  const summary = summarizeReport(loadReport(reportPath));
  emitSummary(summary, reportPath, options);

  return { reportPath, summary };
}

function emitSummary(
  summary: ReportSummary,
  reportPath: string,
  options: RunOptions,
): void {
  if (options.json) {
    writeOut(formatJson(summary, reportPath));
    return;
  }
  writeOut(formatText(summary));
}

/**
 * Runs the CLI against raw `process.argv`-shaped arguments and returns the
 * exit code. Errors are reported on stderr; stdout stays empty.
 */
function runCli(argv: string[]): number {
  try {
    runFromOptions(parseArgs(argv));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeErr(`${message}\n`);
    return 1;
  }
}

export type { RunResult };
export { runCli, runFromOptions };

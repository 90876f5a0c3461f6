import fs from 'node:fs';
import path from 'node:path';
import { ReportError } from '../errors/report-error.js';

interface ReportPattern {
  prefix: string;
  suffix: string;
}

interface LocateOptions {
  pattern?: ReportPattern;
}

const DEFAULT_REPORT_PATH = 'reports';

const DEFAULT_REPORT_PATTERN: ReportPattern = {
  prefix: 'choreo_test_report_',
  suffix: '.json',
};

function matchesReportName(
  name: string,
  pattern: ReportPattern = DEFAULT_REPORT_PATTERN,
): boolean {
  return (
    name.length >= pattern.prefix.length + pattern.suffix.length &&
    name.startsWith(pattern.prefix) &&
    name.endsWith(pattern.suffix)
  );
}

function statOrNull(target: string): fs.Stats | null {
  return fs.statSync(target, { throwIfNoEntry: false }) ?? null;
}

// Keeps the directory as given, so `./reports` stays `./reports/...`.
function joinReportPath(dirPath: string, name: string): string {
  return dirPath.endsWith(path.sep) || dirPath.endsWith('/')
    ? `${dirPath}${name}`
    : `${dirPath}${path.sep}${name}`;
}

function newestReportIn(dirPath: string, pattern: ReportPattern): string | null {
  const candidates = fs
    .readdirSync(dirPath)
    .filter((name) => matchesReportName(name, pattern))
    .map((name) => joinReportPath(dirPath, name))
    .flatMap((filePath) => {
      const stats = statOrNull(filePath);
      return stats?.isFile() ? [{ filePath, mtimeMs: stats.mtimeMs }] : [];
    });

  // Newest first; equal timestamps fall back to the later file name.
  candidates.sort(
    (a, b) => b.mtimeMs - a.mtimeMs || b.filePath.localeCompare(a.filePath),
  );
  return candidates[0]?.filePath ?? null;
}

/**
 * Resolves a file or directory to a single report file. A directory
 * yields its most recently modified report.
 */
function locateReport(reportPath: string, options: LocateOptions = {}): string {
  const stats = statOrNull(reportPath);
  if (stats?.isFile()) {
    return reportPath;
  }
  if (stats?.isDirectory()) {
    const newest = newestReportIn(
      reportPath,
      options.pattern ?? DEFAULT_REPORT_PATTERN,
    );
    if (newest === null) {
      throw ReportError.noReportInDirectory(reportPath);
    }
    return newest;
  }
  throw ReportError.pathNotFound(reportPath);
}

export type { LocateOptions, ReportPattern };
export {
  DEFAULT_REPORT_PATH,
  DEFAULT_REPORT_PATTERN,
  locateReport,
  matchesReportName,
};

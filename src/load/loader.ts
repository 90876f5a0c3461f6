import fs from 'node:fs';
import { ReportError } from '../errors/report-error.js';
import { reportSchema } from '../schema/schema.js';
import type { Feature } from '../runtime/types.js';

function parseReport(raw: unknown, source = '<input>'): Feature[] {
  const parsed = reportSchema.safeParse(raw);
  if (!parsed.success) {
    throw ReportError.notAFeatureList(source);
  }
  return parsed.data;
}

function readReportJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw ReportError.invalidJson(
      filePath,
      error instanceof Error ? error : undefined,
    );
  }
}

function loadReport(filePath: string): Feature[] {
  return parseReport(readReportJson(filePath), filePath);
}

export { loadReport, parseReport };

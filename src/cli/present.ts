import type { FailingStep, ReportSummary } from '../runtime/types.js';

function formatFailingStep(step: FailingStep): string {
  return `${step.uri} :: ${step.scenario} :: ${step.step} [${step.status}]`;
}

function formatText(summary: ReportSummary): string {
  const { tests, failures, time_s } = summary.totals;
  const lines = [`tests=${tests} failures=${failures} time_s=${time_s}`];
  if (summary.failing_steps.length === 0) {
    lines.push('No failing steps.');
  } else {
    lines.push('Failing steps:');
    for (const step of summary.failing_steps) {
      lines.push(`  ${formatFailingStep(step)}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

function formatJson(summary: ReportSummary, reportPath: string): string {
  const payload = {
    totals: summary.totals,
    failing_steps: summary.failing_steps,
    report: reportPath,
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export { formatFailingStep, formatJson, formatText };

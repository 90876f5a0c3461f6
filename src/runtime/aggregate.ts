import type { FailingStep, Feature, ReportSummary, Totals } from './types.js';

const PASSED_STATUS = 'passed';
const UNKNOWN_STATUS = 'unknown';

function sumTotals(features: Feature[]): Totals {
  return features.reduce<Totals>(
    (totals, feature) => ({
      tests: totals.tests + feature.summary.tests,
      failures: totals.failures + feature.summary.failures,
      time_s: totals.time_s + feature.summary.totalTimeInSeconds,
    }),
    { tests: 0, failures: 0, time_s: 0 },
  );
}

/**
 * Collects every step whose status is not exactly `passed`, in document
 * order. A scenario's `after` steps follow its regular steps.
 */
function collectFailingSteps(features: Feature[]): FailingStep[] {
  const failing: FailingStep[] = [];
  for (const feature of features) {
    for (const scenario of feature.elements) {
      for (const step of [...scenario.steps, ...scenario.after]) {
        const status = step.result.status;
        if (status === PASSED_STATUS) {
          continue;
        }
        failing.push({
          uri: feature.uri,
          scenario: scenario.name,
          step: step.name,
          status: status || UNKNOWN_STATUS,
        });
      }
    }
  }
  return failing;
}

function summarizeReport(features: Feature[]): ReportSummary {
  return {
    totals: sumTotals(features),
    failing_steps: collectFailingSteps(features),
  };
}

export { collectFailingSteps, summarizeReport, sumTotals };

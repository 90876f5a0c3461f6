import type { z } from 'zod';
import type {
  featureSchema,
  featureSummarySchema,
  scenarioSchema,
  stepSchema,
} from '../schema/schema.js';

type Feature = z.infer<typeof featureSchema>;
type FeatureSummary = z.infer<typeof featureSummarySchema>;
type Scenario = z.infer<typeof scenarioSchema>;
type Step = z.infer<typeof stepSchema>;

interface Totals {
  tests: number;
  failures: number;
  time_s: number;
}

interface FailingStep {
  uri: string;
  scenario: string;
  step: string;
  status: string;
}

interface ReportSummary {
  totals: Totals;
  failing_steps: FailingStep[];
}

export type {
  FailingStep,
  Feature,
  FeatureSummary,
  ReportSummary,
  Scenario,
  Step,
  Totals,
};

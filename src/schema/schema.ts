import { z } from 'zod';

// Every field falls back to a default instead of failing the parse.
// Object and array defaults come from factories so no two parses share one.
const emptySummary = () => ({ tests: 0, failures: 0, totalTimeInSeconds: 0 });

// Falsy statuses read as '' so they surface as unknown.
const statusSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((status) => (status ? String(status) : ''))
  .catch('');

const stepResultSchema = z
  .object({
    status: statusSchema,
  })
  .catch(() => ({ status: '' }));

const stepSchema = z
  .object({
    name: z.string().catch(''),
    result: stepResultSchema,
  })
  .catch(() => ({ name: '', result: { status: '' } }));

const scenarioSchema = z
  .object({
    name: z.string().catch(''),
    steps: z.array(stepSchema).catch(() => []),
    after: z.array(stepSchema).catch(() => []),
  })
  .catch(() => ({ name: '', steps: [], after: [] }));

const featureSummarySchema = z
  .object({
    tests: z.number().catch(0),
    failures: z.number().catch(0),
    totalTimeInSeconds: z.number().catch(0),
  })
  .catch(emptySummary);

const featureSchema = z
  .object({
    uri: z.string().catch(''),
    elements: z.array(scenarioSchema).catch(() => []),
    summary: featureSummarySchema,
  })
  .catch(() => ({
    uri: '',
    elements: [],
    summary: emptySummary(),
  }));

const reportSchema = z.array(featureSchema);

export {
  featureSchema,
  featureSummarySchema,
  reportSchema,
  scenarioSchema,
  stepSchema,
};

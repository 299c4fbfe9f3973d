import { z } from 'zod';

export const positiveInt = (max: number) => z.number().int().min(1).max(max);
export const fraction = z.number().gt(0).lt(1);
export const percentile = z.number().min(0).max(100);
export const percentileList = z
  .array(percentile)
  .min(1)
  .refine((values) => new Set(values).size === values.length, 'Percentiles must be unique');

export const gridRangeSchema = z
  .object({
    start: z.number().min(0),
    stop: z.number().min(0),
    step: z.number().gt(0),
  })
  .refine((r) => r.start <= r.stop, 'start must not exceed stop');

export const analysisConfigSchema = z.object({
  // ── Normalizer ─────────────────────────────────────────────────────────────
  normalizer: z.object({
    onInvalidRow: z.enum(['drop', 'reject']),
  }),

  // ── Indicators ─────────────────────────────────────────────────────────────
  indicators: z.object({
    channelPct: fraction,
    breakout: z.object({
      window: positiveInt(500),
      threshold: z.number().min(0).max(1),
    }),
    amplitude: z.object({
      maPeriod: positiveInt(500),
      window: positiveInt(1000),
      percentiles: percentileList,
      abnormalPercentile: percentile,
    }),
    openMidDiff: z.object({
      maPeriod: positiveInt(500),
      window: positiveInt(1000),
      percentiles: percentileList,
    }),
    mpmi: z.object({
      fast: positiveInt(500),
      slow: positiveInt(500),
      signal: positiveInt(500),
    }),
  }),

  // ── Alerts ─────────────────────────────────────────────────────────────────
  alerts: z.object({
    window: positiveInt(500),
    amplitudeThresholdPercentile: percentile,
    priceChangeThreshold: z.number().min(0).max(1),
    fundFlowThreshold: z.number().min(0),
  }),

  // ── Backtest ───────────────────────────────────────────────────────────────
  backtest: z.object({
    initialCapital: z.number().gt(0),
    feeRate: z.number().min(0).lt(1),
    upperPct: z.number().min(0).lt(1),
    lowerPct: z.number().min(0).lt(1),
    riskFreeRate: z.number().min(0).max(1),
  }),

  // ── Optimizer ──────────────────────────────────────────────────────────────
  optimizer: z.object({
    upperRange: gridRangeSchema,
    lowerRange: gridRangeSchema,
  }),
});

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

function flattenSchema(schema: z.ZodTypeAny, prefix: string, out: Map<string, z.ZodType>): void {
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    for (const [key, child] of Object.entries(shape)) {
      flattenSchema(child, prefix ? `${prefix}.${key}` : key, out);
    }
    return;
  }
  out.set(prefix, schema);
}

// ── Flat schema map, one entry per dotted config key ─────────────────────────
export const configSchemas: Map<string, z.ZodType> = new Map();
flattenSchema(analysisConfigSchema, '', configSchemas);

/**
 * Look up the Zod schema for a given config key.
 * Returns undefined for unknown keys.
 */
export function getConfigSchema(key: string): z.ZodType | undefined {
  return configSchemas.get(key);
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are rejected: every setting the engines read is declared.
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = configSchemas.get(key);
  if (!schema) {
    return { valid: false, error: `Unknown config key: ${key}` };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  return { valid: false, error: formatIssues(result.error) };
}

export function listIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
  );
}

export function formatIssues(error: z.ZodError): string {
  return listIssues(error).join('; ');
}

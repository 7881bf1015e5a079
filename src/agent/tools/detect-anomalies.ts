/**
 * detect_anomalies: z-score outlier detection over a numeric series.
 */

import { z } from 'zod';

import { defineTool } from './types.js';

export interface AnomalyReport {
  anomalies: Array<{ index: number; value: number; zScore: number }>;
  mean: number;
  /** Population standard deviation */
  std: number;
}

/**
 * Flags values more than `threshold` population standard deviations from
 * the mean. Series shorter than 2 or with zero spread have no anomalies.
 */
export function detectAnomalies(values: readonly number[], threshold = 2): AnomalyReport {
  if (values.length === 0) {
    return { anomalies: [], mean: 0, std: 0 };
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  const std = Math.sqrt(variance);

  if (values.length < 2 || std === 0) {
    return { anomalies: [], mean, std };
  }

  const anomalies = values.flatMap((value, index) => {
    const zScore = (value - mean) / std;
    return Math.abs(zScore) > threshold ? [{ index, value, zScore }] : [];
  });
  return { anomalies, mean, std };
}

export const detectAnomaliesInput = z.object({
  values: z.array(z.number().finite()).min(1).max(100_000).describe('Amounts in time or list order'),
  threshold: z.number().positive().default(2).describe('Z-score above which a value is anomalous'),
});

export const detectAnomaliesOutput = z.object({
  anomalies: z.array(z.object({ index: z.number().int(), value: z.number(), zScore: z.number() })),
  mean: z.number(),
  std: z.number(),
});

export function createDetectAnomaliesTool() {
  return defineTool({
    name: 'detect_anomalies',
    description:
      'Find unusually large or small amounts in a list of numbers using z-scores. ' +
      'Returns the index and value of each outlier.',
    inputSchema: detectAnomaliesInput,
    outputSchema: detectAnomaliesOutput,
    handler: ({ values, threshold }) => detectAnomalies(values, threshold),
  });
}

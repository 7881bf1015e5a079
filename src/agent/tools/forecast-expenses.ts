/**
 * forecast_expenses: moving-average forecast with a normal-approximation
 * interval.
 */

import { z } from 'zod';

import { defineTool } from './types.js';

const WINDOW = 3;
const Z_95 = 1.96;

export const ForecastSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    method: z.literal('moving_average'),
    /** Mean of the last three values */
    baseline: z.number(),
    forecast: z.array(z.number()),
    intervals: z.array(z.object({ lower: z.number().min(0), upper: z.number().min(0) })),
  }),
  z.object({
    status: z.literal('insufficient_data'),
    required: z.number().int(),
    received: z.number().int(),
  }),
]);

export type Forecast = z.infer<typeof ForecastSchema>;

/**
 * Forecasts every period as the mean of the last three values, with a
 * ±1.96 sample standard deviation interval, both bounds clamped at 0.
 */
export function forecastExpenses(history: readonly number[], periods = 1): Forecast {
  if (history.length < WINDOW) {
    return { status: 'insufficient_data', required: WINDOW, received: history.length };
  }

  const recent = history.slice(-WINDOW);
  const baseline = recent.reduce((sum, v) => sum + v, 0) / WINDOW;
  const sampleVariance = recent.reduce((sum, v) => sum + (v - baseline) ** 2, 0) / (WINDOW - 1);
  const margin = Z_95 * Math.sqrt(sampleVariance);

  return {
    status: 'ok',
    method: 'moving_average',
    baseline,
    forecast: Array.from({ length: periods }, () => baseline),
    intervals: Array.from({ length: periods }, () => ({
      lower: Math.max(0, baseline - margin),
      upper: Math.max(0, baseline + margin),
    })),
  };
}

export const forecastExpensesInput = z.object({
  history: z.array(z.number().finite()).max(10_000).describe('Past period totals, oldest first'),
  periods: z.number().int().min(1).max(24).default(1).describe('Periods to forecast'),
});

export function createForecastExpensesTool() {
  return defineTool({
    name: 'forecast_expenses',
    description:
      'Forecast the next period totals from past totals (at least 3 needed) with a 95% interval.',
    inputSchema: forecastExpensesInput,
    outputSchema: ForecastSchema,
    handler: ({ history, periods }) => forecastExpenses(history, periods),
  });
}

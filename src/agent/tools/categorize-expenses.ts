/**
 * categorize_expenses: keyword-based expense categorization.
 *
 * Categories are checked in file order and the first keyword hit wins, so
 * specific phrases ("gas bill") are listed before the bare words they
 * contain ("gas").
 */

import { z } from 'zod';

import categoryTable from './expense-categories.json' with { type: 'json' };
import { defineTool } from './types.js';

const CategoryTableSchema = z.object({
  fallback: z.string().min(1),
  categories: z.array(
    z.object({
      category: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
    })
  ),
});

export type CategoryTable = z.infer<typeof CategoryTableSchema>;

export const DEFAULT_CATEGORY_TABLE: CategoryTable = CategoryTableSchema.parse(categoryTable);

/**
 * First category with a keyword contained in the description, or the
 * table's fallback.
 */
export function categorizeDescription(description: string, table: CategoryTable = DEFAULT_CATEGORY_TABLE): string {
  const text = description.toLowerCase();
  for (const { category, keywords } of table.categories) {
    if (keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
      return category;
    }
  }
  return table.fallback;
}

export const categorizeExpensesInput = z.object({
  transactions: z
    .array(
      z.object({
        description: z.string().min(1),
        amount: z.number().finite().optional(),
      })
    )
    .min(1)
    .max(1000)
    .describe('Transactions to categorize'),
});

export const categorizeExpensesOutput = z.object({
  items: z.array(
    z.object({
      description: z.string(),
      category: z.string(),
      amount: z.number().optional(),
    })
  ),
  /** Summed amounts per category; transactions without an amount count as 0 */
  totals: z.record(z.number()),
});

export function createCategorizeExpensesTool(table: CategoryTable = DEFAULT_CATEGORY_TABLE) {
  return defineTool({
    name: 'categorize_expenses',
    description:
      'Assign a spending category (e.g. "Food & Dining", "Utilities") to each transaction by its description, ' +
      'and total the amounts per category.',
    inputSchema: categorizeExpensesInput,
    outputSchema: categorizeExpensesOutput,
    handler: ({ transactions }) => {
      const totals: Record<string, number> = {};
      const items = transactions.map((transaction) => {
        const category = categorizeDescription(transaction.description, table);
        totals[category] = (totals[category] ?? 0) + (transaction.amount ?? 0);
        return { ...transaction, category };
      });
      return { items, totals };
    },
  });
}

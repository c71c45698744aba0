import { averageMonthly, sumAmounts } from './amounts.js';

import type { SummaryMetrics } from './types.js';
import type { Transaction } from '../../finance-data/core/types.js';

export const summaryMetrics = (filtered: readonly Transaction[]): SummaryMetrics => ({
  total: sumAmounts(filtered),
  averageMonthly: averageMonthly(filtered),
  transactionCount: filtered.length,
  categoryCount: new Set(filtered.map((t) => t.expenditure_category)).size,
});

/**
 * Chart-ready series derived from the computed aggregates.
 * Drawing them is the presentation layer's job.
 */
import type { BudgetSummary, ExpenseMap, SeriesPoint, SpendingInsights } from './types';

/** Pie slices: one per expense category */
export function expenseBreakdownSeries(expenses: ExpenseMap): SeriesPoint[] {
  return Object.entries(expenses).map(([label, value]) => ({ label, value }));
}

/** Grouped bars: income, expenses and what is left */
export function incomeVsExpensesSeries(summary: BudgetSummary): SeriesPoint[] {
  return [
    { label: 'Income', value: summary.income },
    { label: 'Expenses', value: summary.totalExpenses },
    { label: 'Remaining', value: summary.remaining },
  ];
}

export function spendingByCategorySeries(insights: SpendingInsights): SeriesPoint[] {
  return insights.categoryBreakdown.map((c) => ({ label: c.category, value: c.spent }));
}

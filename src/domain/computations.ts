/**
 * Pure domain computations.
 * No HTTP, no IO — only data in, data out.
 *
 * Money is summed in integer cents so repeated additions do not drift,
 * then reported back in dollars.
 */
import type {
  Transaction,
  ExpenseMap,
  CategoryTotal,
  CategoryShare,
  SpendingAnalysis,
  BudgetSummary,
  Recommendation,
} from './types';
import { TARGET_SAVINGS_RATE } from './types';
import { assertAmount } from './validation';
import { formatPercent } from './format';

const toCents = (n: number) => Math.round(n * 100);
const fromCents = (c: number) => c / 100;

/**
 * First entry holding the maximum value. Ties go to the earliest entry,
 * i.e. first-seen / insertion order.
 */
function firstMax(entries: Iterable<[string, number]>): [string, number] | null {
  let best: [string, number] | null = null;
  for (const entry of entries) {
    if (best === null || entry[1] > best[1]) best = entry;
  }
  return best;
}

/** Per-category totals in cents, in first-seen order */
function centsByCategory(txns: readonly Transaction[]): Map<string, number> {
  const map = new Map<string, number>();
  txns.forEach((t, i) => {
    assertAmount(t.amount, `transactions[${i}].amount`);
    map.set(t.category, (map.get(t.category) || 0) + toCents(t.amount));
  });
  return map;
}

function toTotals(byCategory: Map<string, number>): CategoryTotal[] {
  return Array.from(byCategory.entries()).map(([category, cents]) => ({
    category,
    spent: fromCents(cents),
  }));
}

/** Breakdown of spending by category */
export function categoryBreakdown(txns: readonly Transaction[]): CategoryTotal[] {
  return toTotals(centsByCategory(txns));
}

/**
 * Reduce a transaction log into spending insights.
 * An empty log yields `{ status: 'empty' }` instead of dividing by zero.
 */
export function aggregateSpending(txns: readonly Transaction[]): SpendingAnalysis {
  if (txns.length === 0) {
    return { status: 'empty', reason: 'no-transactions' };
  }

  const byCategory = centsByCategory(txns);
  const totalCents = txns.reduce((sum, t) => sum + toCents(t.amount), 0);
  // non-empty input always has at least one category
  const [largestCategory, largestCents] = firstMax(byCategory.entries()) ?? ['', 0];

  return {
    status: 'ok',
    totalSpent: fromCents(totalCents),
    categoryBreakdown: toTotals(byCategory),
    largestCategory,
    largestAmount: fromCents(largestCents),
    transactionCount: txns.length,
    averageTransaction: fromCents(totalCents) / txns.length,
  };
}

/** Sum of all expense amounts */
export function totalExpenses(expenses: ExpenseMap): number {
  const cents = Object.values(expenses).reduce((sum, v) => sum + toCents(v), 0);
  return fromCents(cents);
}

/** Largest expense category, first in insertion order on ties */
export function largestExpenseCategory(expenses: ExpenseMap): string | null {
  const best = firstMax(Object.entries(expenses));
  return best ? best[0] : null;
}

/**
 * Percentage of income left after expenses.
 * 0 when there is no income to take a share of.
 */
export function savingsRate(income: number, expenses: ExpenseMap): number {
  const incomeCents = toCents(income);
  if (incomeCents <= 0) return 0;
  const remainingCents = incomeCents - toCents(totalExpenses(expenses));
  return (remainingCents * 100) / incomeCents;
}

/** Share of total expenses per category, insertion order */
export function categoryPercentages(expenses: ExpenseMap): CategoryShare[] {
  const totalCents = toCents(totalExpenses(expenses));
  return Object.entries(expenses).map(([category, amount]) => ({
    category,
    amount,
    percent: totalCents > 0 ? (toCents(amount) * 100) / totalCents : 0,
  }));
}

export function recommend(savingsRatePercent: number, expenses: ExpenseMap): Recommendation {
  if (savingsRatePercent < TARGET_SAVINGS_RATE) {
    const largest = largestExpenseCategory(expenses);
    const hint = largest
      ? ` Consider reducing expenses in your largest category, ${largest}.`
      : ' Consider setting aside a fixed amount as soon as income arrives.';
    return {
      kind: 'increase-savings',
      targetRatePercent: TARGET_SAVINGS_RATE,
      largestCategory: largest,
      text: `Try to increase your savings rate to at least ${TARGET_SAVINGS_RATE}%.${hint}`,
    };
  }
  return {
    kind: 'on-track',
    text: `Great job! You're saving ${formatPercent(savingsRatePercent)} of your income. Keep up the good work!`,
  };
}

/**
 * Monthly budget summary.
 *
 * remaining = income − total expenses (negative when overspent)
 * savings rate = remaining / income × 100, or 0 without income
 */
export function summarizeBudget(income: number, expenses: ExpenseMap): BudgetSummary {
  assertAmount(income, 'income');
  for (const [category, amount] of Object.entries(expenses)) {
    assertAmount(amount, `expenses.${category}`);
  }

  const spent = totalExpenses(expenses);
  const rate = savingsRate(income, expenses);
  return {
    income,
    totalExpenses: spent,
    remaining: fromCents(toCents(income) - toCents(spent)),
    savingsRatePercent: rate,
    categoryPercentages: categoryPercentages(expenses),
    recommendation: recommend(rate, expenses),
  };
}

/** The budget overview only has something to show with income or expenses */
export function hasBudgetData(income: number, expenses: ExpenseMap): boolean {
  return income > 0 || Object.keys(expenses).length > 0;
}

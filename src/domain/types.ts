/**
 * Domain types for the finance assistant.
 * Pure data — no HTTP, no IO.
 */

export const EXPENSE_CATEGORIES = [
  'Housing',
  'Food',
  'Transportation',
  'Entertainment',
  'Healthcare',
  'Other',
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

/** One recorded expense event */
export interface Transaction {
  amount: number;              // USD, >= 0
  category: string;
  description?: string;
  date: string;                // YYYY-MM-DD
}

/** Monthly amount per category, replaced wholesale on every edit */
export type ExpenseMap = Readonly<Record<string, number>>;

export interface CategoryTotal {
  category: string;
  spent: number;
}

export interface SpendingInsights {
  status: 'ok';
  totalSpent: number;
  categoryBreakdown: CategoryTotal[];   // first-seen order
  largestCategory: string;
  largestAmount: number;
  transactionCount: number;
  averageTransaction: number;
}

export interface EmptyResult {
  status: 'empty';
  reason: 'no-transactions';
}

export type SpendingAnalysis = SpendingInsights | EmptyResult;

export interface CategoryShare {
  category: string;
  amount: number;
  percent: number;
}

export type Recommendation =
  | {
      kind: 'increase-savings';
      targetRatePercent: number;
      largestCategory: string | null;
      text: string;
    }
  | {
      kind: 'on-track';
      text: string;
    };

export interface BudgetSummary {
  income: number;
  totalExpenses: number;
  remaining: number;             // can be negative (overspent)
  savingsRatePercent: number;
  categoryPercentages: CategoryShare[];
  recommendation: Recommendation;
}

/** Chart-ready data point; rendering happens elsewhere */
export interface SeriesPoint {
  label: string;
  value: number;
}

/** Savings rate below this triggers the increase-savings advisory */
export const TARGET_SAVINGS_RATE = 20;

/**
 * JSON shapes exchanged between the server and its clients (snake_case),
 * and the mappers from domain values into them.
 */
import type { BudgetSummary, ExpenseMap, SeriesPoint, SpendingAnalysis, Transaction } from '../domain/types';
import { formatBudgetSummary } from '../domain/format';
import { expenseBreakdownSeries, incomeVsExpensesSeries, spendingByCategorySeries } from '../domain/charts';
import { hasBudgetData } from '../domain/computations';
import type { ChatMessage, Session } from './session';
import type { ProfileType } from './advisor';

export interface ApiTransaction {
  amount: number;
  category: string;
  description: string | null;
  date: string;
}

export interface ApiSession {
  id: string;
  profile_type: ProfileType;
  income: number;
  expenses: Record<string, number>;
  transactions: ApiTransaction[];
  messages: ChatMessage[];
}

export interface ApiEmpty {
  status: 'empty';
  message: string;
}

export interface ApiInsights {
  status: 'ok';
  total_spent: number;
  category_breakdown: Record<string, number>;
  largest_category: string;
  largest_amount: number;
  transaction_count: number;
  average_transaction: number;
}

export interface ApiSummary {
  status: 'ok';
  income: number;
  total_expenses: number;
  remaining: number;
  savings_rate_percent: number;
  per_category_percent: { category: string; amount: number; percent: number }[];
  recommendation: {
    kind: 'increase-savings' | 'on-track';
    text: string;
    largest_category: string | null;
  };
  text: string;
}

export interface ApiCharts {
  expense_breakdown: SeriesPoint[];
  income_vs_expenses: SeriesPoint[];
  spending_by_category: SeriesPoint[];
}

export interface ApiChatTurn {
  reply: string;
  messages: ChatMessage[];
}

export const NO_TRANSACTIONS_MESSAGE =
  'No transactions recorded yet. Add some transactions to see your spending analysis.';

export const NO_BUDGET_MESSAGE =
  'Please enter your income and expenses to see your budget overview.';

export function toApiTransaction(t: Transaction): ApiTransaction {
  return {
    amount: t.amount,
    category: t.category,
    description: t.description ?? null,
    date: t.date,
  };
}

export function toApiSession(session: Session): ApiSession {
  return {
    id: session.id,
    profile_type: session.profileType,
    income: session.income,
    expenses: { ...session.expenses },
    transactions: session.transactions.map(toApiTransaction),
    messages: [...session.messages],
  };
}

export function toApiInsights(analysis: SpendingAnalysis): ApiInsights | ApiEmpty {
  if (analysis.status === 'empty') {
    return { status: 'empty', message: NO_TRANSACTIONS_MESSAGE };
  }
  const breakdown: Record<string, number> = {};
  for (const c of analysis.categoryBreakdown) breakdown[c.category] = c.spent;
  return {
    status: 'ok',
    total_spent: analysis.totalSpent,
    category_breakdown: breakdown,
    largest_category: analysis.largestCategory,
    largest_amount: analysis.largestAmount,
    transaction_count: analysis.transactionCount,
    average_transaction: analysis.averageTransaction,
  };
}

export function toApiSummary(summary: BudgetSummary, expenses: ExpenseMap): ApiSummary | ApiEmpty {
  if (!hasBudgetData(summary.income, expenses)) {
    return { status: 'empty', message: NO_BUDGET_MESSAGE };
  }
  const { recommendation } = summary;
  return {
    status: 'ok',
    income: summary.income,
    total_expenses: summary.totalExpenses,
    remaining: summary.remaining,
    savings_rate_percent: summary.savingsRatePercent,
    per_category_percent: summary.categoryPercentages.map((s) => ({ ...s })),
    recommendation: {
      kind: recommendation.kind,
      text: recommendation.text,
      largest_category: recommendation.kind === 'increase-savings' ? recommendation.largestCategory : null,
    },
    text: formatBudgetSummary(summary),
  };
}

export function toApiCharts(
  expenses: ExpenseMap,
  summary: BudgetSummary,
  analysis: SpendingAnalysis,
): ApiCharts {
  const budget = hasBudgetData(summary.income, expenses);
  return {
    expense_breakdown: budget ? expenseBreakdownSeries(expenses) : [],
    income_vs_expenses: budget ? incomeVsExpensesSeries(summary) : [],
    spending_by_category: analysis.status === 'ok' ? spendingByCategorySeries(analysis) : [],
  };
}

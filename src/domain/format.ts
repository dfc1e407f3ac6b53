import type { BudgetSummary } from './types';

const usdFmt = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export const formatCurrency = (n: number) => usdFmt.format(n);

export const formatPercent = (n: number) => `${n.toFixed(1)}%`;

/** Markdown rendering of a budget summary */
export function formatBudgetSummary(summary: BudgetSummary): string {
  const lines = [
    '**Monthly Budget Summary**',
    '',
    `**Income:** ${formatCurrency(summary.income)}`,
    `**Total Expenses:** ${formatCurrency(summary.totalExpenses)}`,
    `**Remaining:** ${formatCurrency(summary.remaining)}`,
    `**Savings Rate:** ${formatPercent(summary.savingsRatePercent)}`,
    '',
    '**Expense Breakdown:**',
  ];

  for (const share of summary.categoryPercentages) {
    lines.push(`- ${share.category}: ${formatCurrency(share.amount)} (${formatPercent(share.percent)})`);
  }

  const { recommendation } = summary;
  lines.push('');
  lines.push(
    recommendation.kind === 'increase-savings'
      ? `**Recommendation:** ${recommendation.text}`
      : `**${recommendation.text}**`,
  );

  return lines.join('\n');
}

export function formatTipList(tips: readonly string[]): string {
  return tips.map((tip) => `• ${tip}`).join('\n');
}

import { describe, it, expect } from 'vitest';
import {
  addTransaction,
  ask,
  askQuickQuestion,
  budgetSummary,
  clearMessages,
  createSession,
  spendingInsights,
  withBudget,
  withProfile,
} from '../session';

describe('session transitions', () => {
  it('starts empty with the default persona', () => {
    expect(createSession('s1')).toEqual({
      id: 's1',
      profileType: 'young_adult',
      income: 0,
      expenses: {},
      transactions: [],
      messages: [],
    });
  });

  it('withBudget replaces the whole expense map', () => {
    const first = withBudget(createSession('s1'), 1000, { Food: 100, Other: 50 });
    const second = withBudget(first, 2000, { Housing: 500 });

    expect(second.income).toBe(2000);
    expect(second.expenses).toEqual({ Housing: 500 });
    expect(first.expenses).toEqual({ Food: 100, Other: 50 });
  });

  it('addTransaction appends without touching the previous session', () => {
    const before = createSession('s1');
    const after = addTransaction(before, { amount: 12, category: 'Food', date: '2025-02-01' });

    expect(before.transactions).toHaveLength(0);
    expect(after.transactions).toEqual([{ amount: 12, category: 'Food', date: '2025-02-01' }]);
  });

  it('ask records both sides of the exchange', () => {
    const session = withProfile(createSession('s1'), 'student');
    const turn = ask(session, 'How do I budget?');

    expect(turn.reply).toMatch(/^Hey! As a student/);
    expect(turn.session.messages).toEqual([
      { role: 'user', content: 'How do I budget?' },
      { role: 'assistant', content: turn.reply },
    ]);
    expect(session.messages).toHaveLength(0);
  });

  it('askQuickQuestion answers with the tip list', () => {
    const turn = askQuickQuestion(createSession('s1'), 'budgeting');
    const lines = turn.reply.split('\n');

    expect(turn.session.messages[0]).toEqual({ role: 'user', content: 'Give me budgeting tips' });
    expect(lines[0]).toBe('Here are some budgeting tips:');
    expect(lines[1]).toBe('');
    expect(lines[2]).toBe('• Follow the 50/30/20 rule: 50% needs, 30% wants, 20% savings');
    expect(lines).toHaveLength(6);
  });

  it('clearMessages empties the chat history only', () => {
    const chatted = ask(withBudget(createSession('s1'), 500, {}), 'debt?').session;
    const cleared = clearMessages(chatted);

    expect(cleared.messages).toEqual([]);
    expect(cleared.income).toBe(500);
  });
});

describe('session reads', () => {
  it('derives insights and summary from the current state', () => {
    let session = createSession('s1');
    expect(spendingInsights(session)).toEqual({ status: 'empty', reason: 'no-transactions' });

    session = addTransaction(session, { amount: 40, category: 'Food', date: '2025-02-01' });
    session = withBudget(session, 1000, { Housing: 900 });

    expect(spendingInsights(session)).toMatchObject({ status: 'ok', totalSpent: 40, largestCategory: 'Food' });
    expect(budgetSummary(session)).toMatchObject({ remaining: 100, savingsRatePercent: 10 });
  });
});

/**
 * Session state for one assistant user.
 *
 * A session is a plain value: every transition returns a new session and
 * leaves the old one untouched. Whoever holds the session (the server's
 * store, a test) decides where it lives.
 */
import type { BudgetSummary, ExpenseMap, SpendingAnalysis, Transaction } from '../domain/types';
import { aggregateSpending, summarizeBudget } from '../domain/computations';
import { formatTipList } from '../domain/format';
import {
  DEFAULT_PROFILE,
  QUICK_QUESTIONS,
  TIPS,
  getFinancialAdvice,
  type ProfileType,
  type QuickQuestionKind,
} from './advisor';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface Session {
  readonly id: string;
  readonly profileType: ProfileType;
  readonly income: number;
  readonly expenses: ExpenseMap;
  readonly transactions: readonly Transaction[];
  readonly messages: readonly ChatMessage[];
}

export interface ChatTurn {
  session: Session;
  reply: string;
}

export function createSession(id: string): Session {
  return {
    id,
    profileType: DEFAULT_PROFILE,
    income: 0,
    expenses: {},
    transactions: [],
    messages: [],
  };
}

export function withProfile(session: Session, profileType: ProfileType): Session {
  return { ...session, profileType };
}

/** Replaces income and the whole expense map */
export function withBudget(session: Session, income: number, expenses: ExpenseMap): Session {
  return { ...session, income, expenses: { ...expenses } };
}

export function addTransaction(session: Session, txn: Transaction): Session {
  return { ...session, transactions: [...session.transactions, { ...txn }] };
}

function reply(session: Session, prompt: string, answer: string): ChatTurn {
  return {
    session: {
      ...session,
      messages: [
        ...session.messages,
        { role: 'user', content: prompt },
        { role: 'assistant', content: answer },
      ],
    },
    reply: answer,
  };
}

/** Answer a free-text question for the session's persona */
export function ask(session: Session, query: string): ChatTurn {
  return reply(session, query, getFinancialAdvice(query, session.profileType));
}

export function askQuickQuestion(session: Session, kind: QuickQuestionKind): ChatTurn {
  const question = QUICK_QUESTIONS[kind];
  const answer = `${question.intro}\n\n${formatTipList(TIPS[question.topic])}`;
  return reply(session, question.prompt, answer);
}

export function clearMessages(session: Session): Session {
  return { ...session, messages: [] };
}

export function spendingInsights(session: Session): SpendingAnalysis {
  return aggregateSpending(session.transactions);
}

export function budgetSummary(session: Session): BudgetSummary {
  return summarizeBudget(session.income, session.expenses);
}
